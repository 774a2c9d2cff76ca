import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadConfig, parsePositiveInteger } from '../render/config';
import { tailText } from '../render/logger';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 8000,
      converter: { command: '/app/convert.sh', args: [] },
      outputName: 'output.mp4',
      defaultTimeoutSec: 10_800,
      defaultMesh: '320x240',
      defaultEncoderSpeed: 'veryfast',
      authToken: '',
      allowRemoteAudio: true,
      maxDownloadBytes: 0,
      workRoot: os.tmpdir(),
      uploadMode: 'local',
      outputRoot: path.join(os.tmpdir(), 'render-worker-outputs'),
      outputBaseUrl: '',
      logLevel: 'info'
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      CONVERT_SCRIPT: '/opt/render/convert.sh',
      CONVERT_TIMEOUT_SEC: '90.5',
      AUTH_TOKEN: ' test-secret ',
      ALLOW_REMOTE_AUDIO: 'off',
      UPLOAD_MODE: 'NONE',
      OUTPUT_BASE_URL: 'https://cdn.example.com/renders//',
      LOG_LEVEL: 'DEBUG'
    });

    expect(config.port).toBe(9100);
    expect(config.converter.command).toBe('/opt/render/convert.sh');
    expect(config.defaultTimeoutSec).toBe(90.5);
    expect(config.authToken).toBe('test-secret');
    expect(config.allowRemoteAudio).toBe(false);
    expect(config.uploadMode).toBe('none');
    expect(config.outputBaseUrl).toBe('https://cdn.example.com/renders');
    expect(config.logLevel).toBe('debug');
  });

  it('falls back on unusable numbers', () => {
    const config = loadConfig({ PORT: '-1', KILL_GRACE_MS: 'soon', ALLOW_REMOTE_AUDIO: 'maybe' });

    expect(config.port).toBe(8000);
    expect(config.killGraceMs).toBe(5_000);
    expect(config.allowRemoteAudio).toBe(true);
  });

  it('ignores timeouts a timer cannot hold', () => {
    const config = loadConfig({
      CONVERT_TIMEOUT_SEC: '2592000',
      KILL_GRACE_MS: '2147483648',
      DOWNLOAD_TIMEOUT_MS: '3000000000'
    });

    expect(config.defaultTimeoutSec).toBe(10_800);
    expect(config.killGraceMs).toBe(5_000);
    expect(config.downloadTimeoutMs).toBe(120_000);
    expect(loadConfig({ CONVERT_TIMEOUT_SEC: '2147483' }).defaultTimeoutSec).toBe(2_147_483);
  });
});

describe('parsePositiveInteger', () => {
  it('parses integers and rejects the rest', () => {
    expect(parsePositiveInteger('42', 7)).toBe(42);
    expect(parsePositiveInteger('0', 7)).toBe(7);
    expect(parsePositiveInteger(undefined, 7)).toBe(7);
  });
});

describe('tailText', () => {
  it('keeps short output and marks cut output', () => {
    expect(tailText('abc', 5)).toBe('abc');
    expect(tailText('abcdefgh', 3)).toBe('...fgh');
    expect(tailText(undefined, 3)).toBe('');
  });
});
