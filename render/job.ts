import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

import { downloadToFile, fetchRemoteAudio, sanitizeUrlForLog } from './audioFetcher';
import { buildRenderCommand, formatCommand } from './command';
import type { RendererConfig } from './config';
import { InputError, ProcessFailureError, ProcessTimeoutError } from './errors';
import { parseJobConfig } from './jobInput';
import { withJobContext, type Logger } from './logger';
import { assembleSuccess, failureFromError, toJobOutput } from './result';
import { superviseConversion } from './supervisor';
import type {
  AudioSource,
  ConversionSucceeded,
  JobConfig,
  JobOutput,
  ResultRecord,
  TimelineSource
} from './types';
import type { OutputUploader } from './uploader';
import { withWorkspace } from './workspace';

export type RenderDeps = {
  config: Readonly<RendererConfig>;
  logger: Logger;
  uploader: OutputUploader;
};

export type RenderArtifacts = {
  outputPath: string;
  outcome: ConversionSucceeded;
};

const TIMELINE_FILENAME = 'timeline.ini';

/**
 * Job entry point: never throws. Every failure comes back as a tagged
 * record with whatever process output was captured.
 */
export async function runRenderJob(record: unknown, deps: RenderDeps): Promise<ResultRecord> {
  const jobId = resolveJobId(record);
  const logger = withJobContext(deps.logger, jobId);

  try {
    const job = parseJobConfig(readJobInput(record), deps.config);
    logger.info(
      {
        audio: job.audio.kind,
        timeline: job.timeline?.kind ?? 'none',
        settings: job.settings
      },
      'received render job'
    );

    return await withWorkspace(deps.config.workRoot, 'render_job_', logger, async (workDir) => {
      const { outputPath, outcome } = await renderInWorkspace(job, workDir, deps, logger);
      return assembleSuccess(outputPath, outcome, deps.uploader, logger);
    });
  } catch (error: unknown) {
    const failure = failureFromError(error);
    logger.error({ err: error, result: failure.error }, 'returning error result');
    return failure;
  }
}

export async function handleJob(record: unknown, deps: RenderDeps): Promise<JobOutput> {
  return toJobOutput(await runRenderJob(record, deps));
}

/**
 * Materializes inputs inside `workDir`, runs the converter, and returns the
 * output path. Throws the typed errors from `./errors` on any failure.
 */
export async function renderInWorkspace(
  job: JobConfig,
  workDir: string,
  deps: Pick<RenderDeps, 'config'>,
  logger: Logger
): Promise<RenderArtifacts> {
  const { config } = deps;

  const audioPath = await materializeAudio(job.audio, path.join(workDir, job.audioFilename), config, logger);
  const timelinePath = job.timeline
    ? await materializeTimeline(job.timeline, path.join(workDir, TIMELINE_FILENAME), config, logger)
    : undefined;
  const outputPath = path.join(workDir, config.outputName);

  const command = buildRenderCommand({ audioPath, outputPath, timelinePath }, job.settings, config);
  logger.info({ command: formatCommand(command) }, 'executing converter');

  const outcome = await superviseConversion(command, outputPath, {
    timeoutSec: job.settings.timeoutSec,
    killGraceMs: config.killGraceMs,
    logTailChars: config.logStdTail,
    logger
  });

  if (outcome.status === 'timed_out') {
    throw new ProcessTimeoutError(outcome.timeoutSec, outcome);
  }
  if (outcome.status === 'failed') {
    throw new ProcessFailureError(outcome.message, outcome.exitCode, outcome);
  }

  return { outputPath, outcome };
}

async function materializeAudio(
  source: AudioSource,
  targetPath: string,
  config: Pick<RendererConfig, 'downloadTimeoutMs' | 'maxDownloadBytes'>,
  logger: Logger
): Promise<string> {
  switch (source.kind) {
    case 'inline':
      logger.info('received inline audio payload');
      await fs.writeFile(targetPath, Buffer.from(source.base64, 'base64'));
      return targetPath;
    case 'upload':
      await fs.copyFile(source.path, targetPath);
      return targetPath;
    case 'remote': {
      logger.info({ url: sanitizeUrlForLog(source.url) }, 'downloading audio');
      const result = await fetchRemoteAudio(source.url, targetPath, {
        timeoutMs: config.downloadTimeoutMs,
        maxBytes: config.maxDownloadBytes,
        logger
      });
      logger.info({ bytes: result.bytes, contentType: result.contentType }, 'download complete');
      return result.path;
    }
  }
}

async function materializeTimeline(
  source: TimelineSource,
  targetPath: string,
  config: Pick<RendererConfig, 'downloadTimeoutMs' | 'maxDownloadBytes'>,
  logger: Logger
): Promise<string> {
  switch (source.kind) {
    case 'inline':
      logger.info('using inline timeline payload');
      await fs.writeFile(targetPath, source.text, 'utf8');
      return targetPath;
    case 'upload':
      await fs.copyFile(source.path, targetPath);
      return targetPath;
    case 'remote':
      logger.info({ url: sanitizeUrlForLog(source.url) }, 'downloading timeline');
      await downloadToFile(source.url, targetPath, {
        timeoutMs: config.downloadTimeoutMs,
        maxBytes: config.maxDownloadBytes
      });
      return targetPath;
  }
}

function readJobInput(record: unknown): unknown {
  if (!record || typeof record !== 'object' || Array.isArray(record)) {
    throw new InputError('Job record must be an object.');
  }
  return 'input' in record ? record.input : undefined;
}

function resolveJobId(record: unknown): string {
  if (record && typeof record === 'object' && 'id' in record) {
    const { id } = record;
    if ((typeof id === 'string' && id.trim()) || typeof id === 'number') {
      return String(id).trim();
    }
  }
  return randomUUID();
}
