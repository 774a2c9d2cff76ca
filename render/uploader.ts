import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

import type { RendererConfig } from './config';
import { UploadError, getErrorMessage } from './errors';
import type { Logger } from './logger';

export const OUTPUT_ROUTE_PREFIX = '/outputs';
const OUTPUT_FILENAME_REGEX = /^[a-zA-Z0-9._-]+$/;

/** Hands a finished file to durable storage and returns a reference to it. */
export interface OutputUploader {
  upload(localPath: string): Promise<string>;
}

type LocalPublisherConfig = Pick<RendererConfig, 'outputRoot' | 'outputBaseUrl' | 'outputTtlMs'>;

/**
 * Publishes outputs by copying them into `outputRoot`, served back by the
 * HTTP service under {@link OUTPUT_ROUTE_PREFIX}.
 */
export class LocalOutputPublisher implements OutputUploader {
  private rootReady: Promise<void> | undefined;

  constructor(
    private readonly config: LocalPublisherConfig,
    private readonly logger: Logger
  ) {}

  async upload(localPath: string): Promise<string> {
    const extension = path.extname(localPath).toLowerCase() || '.mp4';
    const fileName = `${randomUUID()}${extension}`;

    try {
      await this.ensureRoot();
      await fs.copyFile(localPath, path.join(this.config.outputRoot, fileName));
    } catch (error: unknown) {
      throw new UploadError(`Failed to publish output: ${getErrorMessage(error)}`);
    }

    return this.resolveUrl(fileName);
  }

  resolveUrl(fileName: string): string {
    if (!this.config.outputBaseUrl) {
      return `${OUTPUT_ROUTE_PREFIX}/${fileName}`;
    }
    return `${this.config.outputBaseUrl}/${fileName}`;
  }

  /** Absolute path of a published file, or undefined for names outside the root. */
  resolvePublishedPath(fileName: string): string | undefined {
    if (!OUTPUT_FILENAME_REGEX.test(fileName) || fileName === '.' || fileName === '..') {
      return undefined;
    }

    const rootResolved = path.resolve(this.config.outputRoot);
    const filePath = path.resolve(rootResolved, fileName);
    if (!filePath.startsWith(`${rootResolved}${path.sep}`)) {
      return undefined;
    }
    return filePath;
  }

  ensureRoot(): Promise<void> {
    if (!this.rootReady) {
      this.rootReady = fs.mkdir(this.config.outputRoot, { recursive: true }).then(() => undefined);
      this.rootReady.catch(() => {
        this.rootReady = undefined;
      });
    }
    return this.rootReady;
  }

  async cleanupExpired(now = Date.now()): Promise<number> {
    await this.ensureRoot();

    const files = await fs.readdir(this.config.outputRoot);
    let removed = 0;

    for (const fileName of files) {
      const fullPath = path.join(this.config.outputRoot, fileName);
      const stat = await fs.stat(fullPath).catch(() => null);

      if (!stat || !stat.isFile()) {
        continue;
      }

      if (now - stat.mtimeMs > this.config.outputTtlMs) {
        await fs.rm(fullPath, { force: true });
        removed += 1;
      }
    }

    if (removed > 0) {
      this.logger.info({ removed }, 'expired outputs removed');
    }
    return removed;
  }

  startCleanup(intervalMs: number): NodeJS.Timeout {
    const timer = setInterval(() => {
      this.cleanupExpired().catch((error: unknown) => {
        this.logger.error({ err: error }, 'output cleanup failed');
      });
    }, intervalMs);
    timer.unref();
    return timer;
  }
}

/** Used when publishing is switched off: every success falls back to inline bytes. */
export class DisabledUploader implements OutputUploader {
  async upload(): Promise<string> {
    throw new UploadError('Output publishing is disabled (UPLOAD_MODE=none)');
  }
}

export function createUploader(config: RendererConfig, logger: Logger): OutputUploader {
  if (config.uploadMode === 'none') {
    return new DisabledUploader();
  }
  return new LocalOutputPublisher(config, logger);
}
