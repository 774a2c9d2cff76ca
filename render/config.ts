import os from 'node:os';
import path from 'node:path';

export type UploadMode = 'local' | 'none';

export type RendererConfig = {
  port: number;
  converter: {
    command: string;
    args: string[];
  };
  presetDir: string;
  textureDir: string;
  outputName: string;
  defaultTimeoutSec: number;
  killGraceMs: number;
  defaultMesh: string;
  defaultEncoderSpeed: string;
  authToken: string;
  allowRemoteAudio: boolean;
  downloadTimeoutMs: number;
  maxDownloadBytes: number;
  maxUploadBytes: number;
  maxJsonBytes: number;
  workRoot: string;
  uploadMode: UploadMode;
  outputRoot: string;
  outputBaseUrl: string;
  outputTtlMs: number;
  outputCleanupIntervalMs: number;
  logLevel: string;
  logStdTail: number;
};

type Env = Record<string, string | undefined>;

/** Largest delay a Node.js timer accepts; longer delays fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;
export const MAX_TIMEOUT_SEC = Math.floor(MAX_TIMER_MS / 1000);

export function loadConfig(env: Env = process.env): Readonly<RendererConfig> {
  const workRoot = readString(env.WORK_ROOT, os.tmpdir());

  return Object.freeze({
    port: parsePositiveInteger(env.PORT, 8000),
    converter: {
      command: readString(env.CONVERT_SCRIPT, '/app/convert.sh'),
      args: []
    },
    presetDir: readString(env.PRESET_DIR, '/usr/local/share/projectM/presets'),
    textureDir: readString(env.TEXTURE_DIR, '/usr/local/share/projectM/textures'),
    outputName: readString(env.OUTPUT_NAME, 'output.mp4'),
    defaultTimeoutSec: parseTimeoutSec(env.CONVERT_TIMEOUT_SEC, 10_800),
    killGraceMs: parseTimerMs(env.KILL_GRACE_MS, 5_000),
    defaultMesh: readString(env.DEFAULT_MESH, '320x240'),
    defaultEncoderSpeed: readString(env.DEFAULT_ENCODER_SPEED, 'veryfast'),
    authToken: readString(env.AUTH_TOKEN, ''),
    allowRemoteAudio: parseBoolean(env.ALLOW_REMOTE_AUDIO, true),
    downloadTimeoutMs: parseTimerMs(env.DOWNLOAD_TIMEOUT_MS, 120_000),
    maxDownloadBytes: parseNonNegativeInteger(env.MAX_DOWNLOAD_BYTES, 0),
    maxUploadBytes: parsePositiveInteger(env.MAX_UPLOAD_BYTES, 2 * 1024 * 1024 * 1024),
    maxJsonBytes: parsePositiveInteger(env.MAX_JSON_BYTES, 64 * 1024 * 1024),
    workRoot,
    uploadMode: parseUploadMode(env.UPLOAD_MODE),
    outputRoot: readString(env.OUTPUT_ROOT, path.join(os.tmpdir(), 'render-worker-outputs')),
    outputBaseUrl: readString(env.OUTPUT_BASE_URL, '').replace(/\/+$/, ''),
    outputTtlMs: parsePositiveInteger(env.OUTPUT_TTL_MS, 6 * 60 * 60 * 1000),
    outputCleanupIntervalMs: parsePositiveInteger(env.OUTPUT_CLEANUP_INTERVAL_MS, 10 * 60 * 1000),
    logLevel: readString(env.LOG_LEVEL, 'info').toLowerCase(),
    logStdTail: parsePositiveInteger(env.LOG_STD_TAIL, 1200)
  });
}

function readString(value: string | undefined, fallback: string): string {
  const trimmed = String(value || '').trim();
  return trimmed || fallback;
}

export function parsePositiveInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || '', 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

function parseNonNegativeInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || '', 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return parsed;
}

function parsePositiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(value || '');
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

function parseTimeoutSec(value: string | undefined, fallback: number): number {
  const parsed = parsePositiveNumber(value, fallback);
  return parsed > MAX_TIMEOUT_SEC ? fallback : parsed;
}

function parseTimerMs(value: string | undefined, fallback: number): number {
  const parsed = parsePositiveInteger(value, fallback);
  return parsed > MAX_TIMER_MS ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  const normalized = String(value || '').trim().toLowerCase();
  if (/^(1|true|yes|on)$/.test(normalized)) {
    return true;
  }
  if (/^(0|false|no|off)$/.test(normalized)) {
    return false;
  }
  return fallback;
}

function parseUploadMode(value: string | undefined): UploadMode {
  return String(value || '').trim().toLowerCase() === 'none' ? 'none' : 'local';
}
