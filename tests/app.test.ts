import fs from 'node:fs/promises';
import path from 'node:path';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp, removeUploadedFiles } from '../render/app';
import type { RendererConfig } from '../render/config';
import { createUploader } from '../render/uploader';
import {
  fixtureConverter,
  makeTempDir,
  silentLogger,
  startTestServer,
  testConfig,
  type TestServer
} from './helpers';

const AUTH = { Authorization: 'Bearer test-secret' };

function audioForm(fields: Record<string, string> = {}): FormData {
  const form = new FormData();
  form.append('audio_file', new Blob(['ID3-fake-audio'], { type: 'audio/wav' }), 'song.wav');
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  return form;
}

describe('HTTP service', () => {
  let baseDir: string;
  let workRoot: string;
  let server: TestServer | undefined;

  async function start(overrides: Partial<RendererConfig> = {}): Promise<string> {
    const config = testConfig({
      workRoot,
      outputRoot: path.join(baseDir, 'outputs'),
      authToken: 'test-secret',
      ...overrides
    });
    server = await startTestServer(
      createApp({ config, logger: silentLogger, uploader: createUploader(config, silentLogger) })
    );
    return server.url;
  }

  beforeEach(async () => {
    baseDir = await makeTempDir('app-test-');
    workRoot = path.join(baseDir, 'work');
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('answers health checks without auth', async () => {
    const url = await start();
    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ status: 'ok' });
  });

  it('rejects render requests without a valid bearer token', async () => {
    const url = await start();

    const missing = await fetch(`${url}/render`, { method: 'POST', body: audioForm() });
    expect(missing.status).toBe(401);
    await expect(missing.json()).resolves.toEqual({ error: 'Missing bearer token' });

    const wrong = await fetch(`${url}/render`, {
      method: 'POST',
      headers: { Authorization: 'Bearer wrong-secret' },
      body: audioForm()
    });
    expect(wrong.status).toBe(401);
    await expect(wrong.json()).resolves.toEqual({ error: 'Invalid bearer token' });
  });

  it('streams the rendered video back with converter output headers', async () => {
    const url = await start();
    const response = await fetch(`${url}/render`, {
      method: 'POST',
      headers: AUTH,
      body: audioForm({ fps: '30', mesh: '64x48' })
    });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="output.mp4"');
    expect(response.headers.get('x-convert-stdout')).toMatch(/^rendering to .*\/render_pod_[^/]+\/output\.mp4$/);
    expect(response.headers.get('x-convert-stderr')).toBe('encoder warning');
    await expect(response.text()).resolves.toBe('fake-video-bytes');

    await vi.waitFor(async () => {
      expect(await fs.readdir(workRoot)).toEqual(['render-uploads']);
      expect(await fs.readdir(path.join(workRoot, 'render-uploads'))).toEqual([]);
    });
  });

  it('prefers an uploaded timeline over inline timeline text', async () => {
    const url = await start();
    const form = audioForm({ timeline_ini: '[from-ini]' });
    form.append('timeline_file', new Blob(['[from-file]'], { type: 'text/plain' }), 'timeline.ini');
    const response = await fetch(`${url}/render`, { method: 'POST', headers: AUTH, body: form });

    expect(response.status).toBe(200);
    expect(response.headers.get('x-convert-stdout')).toMatch(/ timeline: \[from-file\]$/);
  });

  it('prefers a timeline URL over an uploaded timeline', async () => {
    const timelineHost = await startTestServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('[from-url]');
    });
    try {
      const url = await start();
      const form = audioForm({ timeline_url: `${timelineHost.url}/timeline.ini` });
      form.append('timeline_file', new Blob(['[from-file]'], { type: 'text/plain' }), 'timeline.ini');
      const response = await fetch(`${url}/render`, { method: 'POST', headers: AUTH, body: form });

      expect(response.status).toBe(200);
      expect(response.headers.get('x-convert-stdout')).toMatch(/ timeline: \[from-url\]$/);
    } finally {
      await timelineHost.close();
    }
  });

  it('returns 400 when no audio is supplied', async () => {
    const url = await start();
    const form = new FormData();
    form.append('fps', '30');
    const response = await fetch(`${url}/render`, { method: 'POST', headers: AUTH, body: form });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'Must supply audio_file or audio_url' });
  });

  it('returns 400 for invalid settings', async () => {
    const url = await start();
    const response = await fetch(`${url}/render`, {
      method: 'POST',
      headers: AUTH,
      body: audioForm({ video_width: 'wide' })
    });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'Field "video_width" must be a positive integer.' });
  });

  it('returns 500 with converter output when the conversion fails', async () => {
    const url = await start({ converter: fixtureConverter('failing-convert.sh') });
    const response = await fetch(`${url}/render`, { method: 'POST', headers: AUTH, body: audioForm() });

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      error: 'Conversion failed (exit code 3)',
      stdout: 'loading presets\n',
      stderr: 'gst pipeline error\n'
    });
  });

  it('returns 504 when the conversion times out', async () => {
    const url = await start({ converter: fixtureConverter('slow-convert.sh') });
    const response = await fetch(`${url}/render`, {
      method: 'POST',
      headers: AUTH,
      body: audioForm({ timeout_sec: '0.3' })
    });

    expect(response.status).toBe(504);
    await expect(response.json()).resolves.toEqual({
      error: 'Conversion timed out after 0.3 seconds',
      stdout: 'starting slow render\n',
      stderr: ''
    });
  });

  it('runs JSON jobs and serves the published output', async () => {
    const url = await start();
    const response = await fetch(`${url}/run`, {
      method: 'POST',
      headers: { ...AUTH, 'Content-Type': 'application/json' },
      body: JSON.stringify({ id: 'http-job', input: { audio_b64: 'SUQzLWZha2UtYXVkaW8=' } })
    });

    expect(response.status).toBe(200);
    const result: unknown = await response.json();
    expect(result).toMatchObject({ file_size_mb: 0, stderr: 'encoder warning\n' });

    const videoUrl =
      typeof result === 'object' && result !== null && 'video_url' in result ? String(result.video_url) : '';
    expect(videoUrl).toMatch(/^\/outputs\/[0-9a-f-]{36}\.mp4$/);

    const video = await fetch(`${url}${videoUrl}`);
    expect(video.status).toBe(200);
    await expect(video.text()).resolves.toBe('fake-video-bytes');
  });

  it('reports job failures inside a 200 response', async () => {
    const url = await start();
    const response = await fetch(`${url}/run`, {
      method: 'POST',
      headers: { ...AUTH, 'Content-Type': 'application/json' },
      body: JSON.stringify({ id: 'http-job', input: {} })
    });

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ error: 'Missing audio_b64 or audio_url in payload' });
  });

  it('rejects malformed JSON bodies', async () => {
    const url = await start();
    const response = await fetch(`${url}/run`, {
      method: 'POST',
      headers: { ...AUTH, 'Content-Type': 'application/json' },
      body: '{"input":'
    });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'Invalid JSON body.' });
  });

  it('limits JSON bodies separately from uploads', async () => {
    const url = await start({ maxJsonBytes: 1024 });
    const response = await fetch(`${url}/run`, {
      method: 'POST',
      headers: { ...AUTH, 'Content-Type': 'application/json' },
      body: JSON.stringify({ id: 'http-job', input: { audio_b64: 'A'.repeat(2048) } })
    });

    expect(response.status).toBe(413);
    await expect(response.json()).resolves.toEqual({ error: 'Request body too large.' });
  });

  it('guards the outputs route', async () => {
    const url = await start();

    const traversal = await fetch(`${url}/outputs/..%2Fsecret.mp4`);
    expect(traversal.status).toBe(400);
    await expect(traversal.json()).resolves.toEqual({ error: 'Invalid file name.' });

    const missing = await fetch(`${url}/outputs/absent.mp4`);
    expect(missing.status).toBe(404);
    await expect(missing.json()).resolves.toEqual({ error: 'File not found.' });
  });

  it('answers unknown routes with 404', async () => {
    const url = await start();
    const response = await fetch(`${url}/nope`);

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: 'Route not found.' });
  });
});

describe('removeUploadedFiles', () => {
  it('logs a failed removal instead of rejecting', async () => {
    const dir = await makeTempDir('upload-cleanup-test-');
    const log = pino({ level: 'silent' });
    const errorSpy = vi.spyOn(log, 'error');

    try {
      await expect(removeUploadedFiles([dir, undefined], log)).resolves.toBeUndefined();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
