/**
 * JSON logger shared by the HTTP service and the job worker.
 * Redacts credentials and the large base64 payloads jobs carry.
 */
import pino from 'pino';

import type { RendererConfig } from './config';

const REDACT_PATHS = [
  'authorization',
  'req.headers.authorization',
  'input.audio_b64',
  'input.timeline_ini',
  'audio_b64',
  'base_video_b64',
  'timeline_ini'
];

export type Logger = pino.Logger;

export type LoggerOptions = {
  // The job CLI keeps stdout for the result record.
  stderr?: boolean;
};

export function createLogger(
  config: Pick<RendererConfig, 'logLevel'>,
  options: LoggerOptions = {}
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: config.logLevel,
    base: { service: 'render-worker' },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]'
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  return options.stderr ? pino(loggerOptions, pino.destination(2)) : pino(loggerOptions);
}

export function withJobContext(logger: Logger, jobId: string): Logger {
  return logger.child({ jobId });
}

/** Last `maxChars` characters of process output, marked when cut. */
export function tailText(text: string | undefined, maxChars: number): string {
  if (!text) {
    return '';
  }
  if (text.length <= maxChars) {
    return text;
  }
  return `...${text.slice(-maxChars)}`;
}
