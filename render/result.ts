import fs from 'node:fs/promises';

import { DownloadError, RenderHttpError, getErrorMessage, isProcessError } from './errors';
import type { Logger } from './logger';
import type { OutputUploader } from './uploader';
import type { ConversionSucceeded, JobOutput, RenderFailure, RenderSuccess, ResultRecord } from './types';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Publishes the rendered file. A failed upload is not fatal: the bytes are
 * returned inline and the upload error travels with the result.
 */
export async function assembleSuccess(
  outputPath: string,
  outcome: ConversionSucceeded,
  uploader: OutputUploader,
  logger: Logger
): Promise<RenderSuccess> {
  const stat = await fs.stat(outputPath);
  const fileSizeMb = roundMb(stat.size);

  logger.info({ fileSizeMb }, 'uploading rendered video');

  try {
    const url = await uploader.upload(outputPath);
    logger.info({ url }, 'video uploaded');
    return {
      ok: true,
      output: { kind: 'uploaded', url },
      fileSizeMb,
      stdout: outcome.stdout,
      stderr: outcome.stderr
    };
  } catch (error: unknown) {
    const uploadError = getErrorMessage(error) || 'upload failed';
    logger.error({ err: error }, 'upload failed, falling back to inline base64');

    const bytes = await fs.readFile(outputPath);
    return {
      ok: true,
      output: { kind: 'inline', base64: bytes.toString('base64'), uploadError },
      fileSizeMb,
      stdout: outcome.stdout,
      stderr: outcome.stderr
    };
  }
}

export function failureFromError(error: unknown): RenderFailure {
  if (isProcessError(error)) {
    return { ok: false, error: error.message, stdout: error.stdout, stderr: error.stderr };
  }

  if (error instanceof DownloadError) {
    return { ok: false, error: `Remote download failed: ${error.message}` };
  }

  if (error instanceof RenderHttpError) {
    return { ok: false, error: error.message };
  }

  return { ok: false, error: `Render handler crashed: ${getErrorMessage(error)}` };
}

export function toJobOutput(record: ResultRecord): JobOutput {
  if (!record.ok) {
    return {
      error: record.error,
      ...(record.stdout !== undefined ? { stdout: record.stdout } : {}),
      ...(record.stderr !== undefined ? { stderr: record.stderr } : {})
    };
  }

  if (record.output.kind === 'uploaded') {
    return {
      video_url: record.output.url,
      file_size_mb: record.fileSizeMb,
      stdout: record.stdout,
      stderr: record.stderr
    };
  }

  return {
    base_video_b64: record.output.base64,
    file_size_mb: record.fileSizeMb,
    upload_error: record.output.uploadError,
    stdout: record.stdout,
    stderr: record.stderr
  };
}

function roundMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}
