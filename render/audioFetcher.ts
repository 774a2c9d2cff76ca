import fs from 'node:fs/promises';
import { createWriteStream } from 'node:fs';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { ReadableStream as WebReadableStream } from 'node:stream/web';

import { DownloadError } from './errors';
import { findRedirectCandidate } from './htmlRedirect';
import type { Logger } from './logger';
import { normalizeStorageUrl } from './urlNormalizer';

export const MAX_RESOLVE_ATTEMPTS = 4;
const WRITE_CHUNK_BYTES = 1024 * 1024;
/** Landing pages are scanned in memory; anything larger is not one. */
export const MAX_PAGE_BYTES = 2 * 1024 * 1024;

export const DEFAULT_DOWNLOAD_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
  Accept: 'audio/*,text/html;q=0.9,*/*;q=0.8'
};

export type FetchOptions = {
  timeoutMs: number;
  maxBytes?: number;
  logger?: Logger;
};

export type FetchResult = {
  path: string;
  bytes: number;
  contentType: string;
  resolvedUrl: string;
};

/**
 * Resolves `sourceUrl` to audio bytes on disk, chasing HTML landing pages
 * for at most {@link MAX_RESOLVE_ATTEMPTS} requests.
 */
export async function fetchRemoteAudio(
  sourceUrl: string,
  destinationPath: string,
  options: FetchOptions
): Promise<FetchResult> {
  const { logger } = options;
  let url = normalizeStorageUrl(sourceUrl);

  for (let attempt = 1; attempt <= MAX_RESOLVE_ATTEMPTS; attempt += 1) {
    logger?.debug({ attempt, url: sanitizeUrlForLog(url) }, 'requesting remote audio');

    const request = await openRequest(url, options.timeoutMs);
    const contentType = String(request.response.headers.get('content-type') || '').toLowerCase();

    if (contentType.startsWith('audio/')) {
      const bytes = await streamToFile(request, destinationPath, options.maxBytes ?? 0);
      return {
        path: destinationPath,
        bytes,
        contentType: contentType.split(';')[0].trim(),
        resolvedUrl: url
      };
    }

    const html = await readBodyText(request, pageByteLimit(options.maxBytes ?? 0));
    const candidate = findRedirectCandidate(html);
    if (!candidate) {
      throw new DownloadError(
        'Remote URL returned HTML or requires authentication. Ensure the link is publicly accessible.'
      );
    }

    logger?.info(
      { attempt, matcher: candidate.matcher, next: sanitizeUrlForLog(candidate.url) },
      'following embedded download link'
    );
    url = candidate.url;
  }

  throw new DownloadError('Could not resolve remote audio after multiple attempts.');
}

/** Plain download without content-type checks or redirect chasing. */
export async function downloadToFile(
  url: string,
  destinationPath: string,
  options: FetchOptions
): Promise<number> {
  const request = await openRequest(url, options.timeoutMs);
  return streamToFile(request, destinationPath, options.maxBytes ?? 0);
}

type OpenRequest = {
  response: Response;
  timeout: NodeJS.Timeout;
  timeoutMs: number;
};

async function openRequest(url: string, timeoutMs: number): Promise<OpenRequest> {
  const controller = new AbortController();
  // Idle timeout: refreshed on every received chunk.
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: DEFAULT_DOWNLOAD_HEADERS,
      signal: controller.signal
    });
  } catch (error: unknown) {
    clearTimeout(timeout);
    if (isAbortError(error)) {
      throw new DownloadError(`Timed out requesting ${sanitizeUrlForLog(url)} (${timeoutMs}ms).`);
    }
    throw new DownloadError(`Network error requesting ${sanitizeUrlForLog(url)}.`);
  }

  if (!response.ok) {
    clearTimeout(timeout);
    await response.body?.cancel().catch(() => undefined);
    throw new DownloadError(`Remote server responded with HTTP ${response.status}.`, response.status);
  }

  return { response, timeout, timeoutMs };
}

function pageByteLimit(maxBytes: number): number {
  return maxBytes > 0 ? Math.min(maxBytes, MAX_PAGE_BYTES) : MAX_PAGE_BYTES;
}

async function readBodyText(request: OpenRequest, limitBytes: number): Promise<string> {
  const { response, timeout, timeoutMs } = request;
  const limitError = () => new DownloadError(`Remote response exceeds the ${limitBytes} byte limit.`);

  const declaredSize = Number.parseInt(response.headers.get('content-length') || '', 10);
  if (Number.isFinite(declaredSize) && declaredSize > limitBytes) {
    clearTimeout(timeout);
    await response.body?.cancel().catch(() => undefined);
    throw limitError();
  }

  if (!response.body) {
    clearTimeout(timeout);
    return '';
  }

  const reader = (response.body as unknown as WebReadableStream<Uint8Array>).getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      timeout.refresh();
      totalBytes += value.byteLength;
      if (totalBytes > limitBytes) {
        await reader.cancel().catch(() => undefined);
        throw limitError();
      }
      chunks.push(value);
    }
    return new TextDecoder('utf-8', { fatal: false }).decode(Buffer.concat(chunks));
  } catch (error: unknown) {
    if (error instanceof DownloadError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new DownloadError(`Timed out reading remote page (${timeoutMs}ms).`);
    }
    throw new DownloadError('Failed to read remote page.');
  } finally {
    clearTimeout(timeout);
  }
}

async function streamToFile(request: OpenRequest, destinationPath: string, maxBytes: number): Promise<number> {
  const { response, timeout, timeoutMs } = request;

  if (!response.body) {
    clearTimeout(timeout);
    throw new DownloadError('Remote server returned no body.');
  }

  let totalBytes = 0;
  const counter = new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null, data?: Buffer) => void) {
      timeout.refresh();
      totalBytes += chunk.length;
      if (maxBytes > 0 && totalBytes > maxBytes) {
        callback(new DownloadError(`Remote file exceeds the ${maxBytes} byte limit.`));
      } else {
        callback(null, chunk);
      }
    }
  });

  let completed = false;
  try {
    const bodyStream = Readable.fromWeb(response.body as unknown as WebReadableStream<Uint8Array>);
    await pipeline(bodyStream, counter, createWriteStream(destinationPath, { highWaterMark: WRITE_CHUNK_BYTES }));

    const stat = await fs.stat(destinationPath);
    if (stat.size === 0) {
      throw new DownloadError('Remote download returned an empty file.');
    }

    completed = true;
    return stat.size;
  } catch (error: unknown) {
    if (error instanceof DownloadError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new DownloadError(`Timed out downloading remote file (${timeoutMs}ms).`);
    }
    throw new DownloadError('Failed to save remote file.');
  } finally {
    clearTimeout(timeout);
    if (!completed) {
      await fs.rm(destinationPath, { force: true });
    }
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function sanitizeUrlForLog(urlValue: string): string {
  try {
    const parsed = new URL(urlValue);
    parsed.username = '';
    parsed.password = '';
    parsed.search = '';
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return '[invalid-url]';
  }
}
