import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';

import { requireBearerToken } from './auth';
import type { RendererConfig } from './config';
import { InputError, ProcessFailureError, ProcessTimeoutError, RenderHttpError } from './errors';
import { handleJob, renderInWorkspace, type RenderDeps } from './job';
import {
  parseAudioSource,
  parseInlineTimeline,
  parseRenderSettings,
  parseTimelineUrl,
  requireInputMap,
  resolveAudioFilename
} from './jobInput';
import type { Logger } from './logger';
import type { ConversionSucceeded, JobConfig } from './types';
import { LocalOutputPublisher, OUTPUT_ROUTE_PREFIX } from './uploader';
import { withWorkspace } from './workspace';

type RenderUploads = {
  audio?: Express.Multer.File;
  timeline?: Express.Multer.File;
};

const ERROR_OUTPUT_CHARS = 2000;
const HEADER_OUTPUT_CHARS = 512;

export function createApp(deps: RenderDeps): express.Express {
  const { config, logger, uploader } = deps;
  const app = express();
  const auth = requireBearerToken(config.authToken);
  const upload = multer({
    dest: path.join(config.workRoot, 'render-uploads'),
    limits: { fileSize: config.maxUploadBytes }
  });

  app.disable('x-powered-by');
  app.use(express.json({ limit: config.maxJsonBytes }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  if (uploader instanceof LocalOutputPublisher) {
    app.get(`${OUTPUT_ROUTE_PREFIX}/:filename`, async (req: Request, res: Response) => {
      const filePath = uploader.resolvePublishedPath(String(req.params.filename || '').trim());
      if (!filePath) {
        return res.status(400).json({ error: 'Invalid file name.' });
      }

      try {
        const stat = await fs.stat(filePath);
        if (!stat.isFile()) {
          return res.status(404).json({ error: 'File not found.' });
        }
      } catch {
        return res.status(404).json({ error: 'File not found.' });
      }

      res.setHeader('Cache-Control', 'public, max-age=86400');
      return res.sendFile(filePath, (error?: Error) => {
        if (!error || res.headersSent) {
          return;
        }
        res.status(500).json({ error: 'Failed to send file.' });
      });
    });
  }

  // Serverless-style entry: always 200, failures travel inside the result map.
  app.post('/run', auth, async (req: Request, res: Response) => {
    const result = await handleJob(req.body, deps);
    res.status(200).json(result);
  });

  app.post(
    '/render',
    auth,
    upload.fields([
      { name: 'audio_file', maxCount: 1 },
      { name: 'timeline_file', maxCount: 1 }
    ]),
    async (req: Request, res: Response) => {
      const log = logger.child({ requestId: randomUUID() });
      const uploads = collectUploads(req);

      try {
        const job = parseRenderRequest(req.body, uploads, config);
        log.info({ audio: job.audio.kind, timeline: job.timeline?.kind ?? 'none' }, 'render request accepted');

        await withWorkspace(config.workRoot, 'render_pod_', log, async (workDir) => {
          const { outputPath, outcome } = await renderInWorkspace(job, workDir, deps, log);
          await sendVideo(res, outputPath, config.outputName, outcome);
        });

        log.info('render response sent');
      } catch (error: unknown) {
        if (res.headersSent) {
          log.error({ err: error }, 'render response interrupted');
          res.end();
          return;
        }
        sendRenderError(res, error, log);
      } finally {
        await removeUploadedFiles([uploads.audio?.path, uploads.timeline?.path], log);
      }
    }
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found.' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      return res.status(400).json({ error: `Upload rejected: ${error.message}` });
    }

    if (isBodyTooLarge(error)) {
      return res.status(413).json({ error: 'Request body too large.' });
    }

    if (error instanceof SyntaxError && 'body' in error) {
      return res.status(400).json({ error: 'Invalid JSON body.' });
    }

    logger.error({ err: error }, 'unexpected http error');
    return res.status(500).json({ error: 'Unexpected internal error.' });
  });

  return app;
}

/** An uploaded file wins over `audio_url`; `timeline_url` over `timeline_file` over `timeline_ini`. */
export function parseRenderRequest(
  body: unknown,
  uploads: RenderUploads,
  config: Pick<RendererConfig, 'defaultMesh' | 'defaultEncoderSpeed' | 'defaultTimeoutSec' | 'allowRemoteAudio'>
): JobConfig {
  const fields = requireInputMap(body);

  const audio = uploads.audio
    ? { kind: 'upload' as const, path: uploads.audio.path }
    : parseAudioSource(fields, config);
  if (!audio) {
    throw new InputError('Must supply audio_file or audio_url');
  }

  return {
    audio,
    audioFilename: resolveAudioFilename(uploads.audio?.originalname ?? fields.audio_filename),
    timeline:
      parseTimelineUrl(fields) ??
      (uploads.timeline ? { kind: 'upload', path: uploads.timeline.path } : parseInlineTimeline(fields)),
    settings: parseRenderSettings(fields, config)
  };
}

function isBodyTooLarge(error: unknown): boolean {
  return error instanceof Error && 'type' in error && error.type === 'entity.too.large';
}

function collectUploads(req: Request): RenderUploads {
  const files = req.files;
  if (!files || Array.isArray(files)) {
    return {};
  }
  return {
    audio: files.audio_file?.[0],
    timeline: files.timeline_file?.[0]
  };
}

export async function removeUploadedFiles(filePaths: Array<string | undefined>, log: Logger): Promise<void> {
  const paths = filePaths.filter((value): value is string => typeof value === 'string');
  await Promise.all(paths.map((filePath) => fs.rm(filePath, { force: true }))).catch((cleanupError: unknown) => {
    log.error({ err: cleanupError, paths }, 'upload cleanup failed');
  });
}

function sendVideo(
  res: Response,
  outputPath: string,
  fileName: string,
  outcome: ConversionSucceeded
): Promise<void> {
  return new Promise((resolve, reject) => {
    res.download(
      outputPath,
      fileName,
      {
        headers: {
          'X-Convert-Stdout': toHeaderValue(outcome.stdout),
          'X-Convert-Stderr': toHeaderValue(outcome.stderr)
        }
      },
      (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      }
    );
  });
}

function sendRenderError(res: Response, error: unknown, log: Logger): void {
  if (error instanceof ProcessTimeoutError) {
    res.status(error.statusCode).json({
      error: error.message,
      stdout: error.stdout.slice(-ERROR_OUTPUT_CHARS),
      stderr: error.stderr.slice(-ERROR_OUTPUT_CHARS)
    });
    return;
  }

  if (error instanceof ProcessFailureError) {
    res.status(error.statusCode).json({
      error: error.message,
      stdout: error.stdout.slice(-ERROR_OUTPUT_CHARS),
      stderr: error.stderr.slice(-ERROR_OUTPUT_CHARS)
    });
    return;
  }

  if (error instanceof RenderHttpError) {
    log.warn({ err: error }, 'render request rejected');
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  log.error({ err: error }, 'unexpected render failure');
  res.status(500).json({ error: 'Unexpected render failure.' });
}

function toHeaderValue(text: string): string {
  return text.replace(/[^\x20-\x7e]/g, ' ').slice(-HEADER_OUTPUT_CHARS).trim();
}
