import type { RendererConfig } from './config';
import type { RenderCommand, RenderSettings } from './types';

export type RenderPaths = {
  audioPath: string;
  outputPath: string;
  timelinePath?: string;
};

/**
 * Argument vector for the converter script. A timeline and a flat preset
 * duration are mutually exclusive: exactly one of `--timeline` / `-d` is emitted.
 */
export function buildRenderCommand(
  paths: RenderPaths,
  settings: RenderSettings,
  config: Pick<RendererConfig, 'converter' | 'presetDir' | 'textureDir'>
): RenderCommand {
  const args = [
    ...config.converter.args,
    '-i',
    paths.audioPath,
    '-o',
    paths.outputPath,
    '-p',
    config.presetDir,
    '--texture',
    config.textureDir,
    '--mesh',
    settings.mesh,
    '--video-size',
    `${settings.videoWidth}x${settings.videoHeight}`,
    '-r',
    String(settings.fps),
    '-b',
    String(settings.bitrateKbps),
    '--speed',
    settings.encoderSpeed
  ];

  if (paths.timelinePath !== undefined) {
    args.push('--timeline', paths.timelinePath);
  } else {
    args.push('-d', String(settings.presetDuration));
  }

  return {
    command: config.converter.command,
    args
  };
}

export function formatCommand(command: RenderCommand): string {
  return [command.command, ...command.args].join(' ');
}
