import path from 'node:path';

import { MAX_TIMEOUT_SEC, type RendererConfig } from './config';
import { InputError } from './errors';
import type {
  AudioSource,
  EncoderSpeed,
  JobConfig,
  RenderSettings,
  TimelineSource
} from './types';

export const DEFAULT_VIDEO_WIDTH = 1920;
export const DEFAULT_VIDEO_HEIGHT = 1080;
export const DEFAULT_FPS = 60;
export const DEFAULT_BITRATE_KBPS = 8000;
export const DEFAULT_PRESET_DURATION = 60;
const DEFAULT_AUDIO_EXTENSION = '.mp3';

const ENCODER_SPEEDS: readonly EncoderSpeed[] = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow'
];

export type JobInputConfig = Pick<
  RendererConfig,
  'defaultMesh' | 'defaultEncoderSpeed' | 'defaultTimeoutSec' | 'allowRemoteAudio'
>;

type InputMap = Record<string, unknown>;

export function parseJobConfig(input: unknown, config: JobInputConfig): JobConfig {
  const fields = requireInputMap(input);
  const audio = parseAudioSource(fields, config);
  if (!audio) {
    throw new InputError('Missing audio_b64 or audio_url in payload');
  }

  return {
    audio,
    audioFilename: resolveAudioFilename(fields.audio_filename),
    timeline: parseTimelineSource(fields),
    settings: parseRenderSettings(fields, config)
  };
}

export function requireInputMap(input: unknown): InputMap {
  if (input === undefined || input === null) {
    return {};
  }
  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new InputError('Job "input" must be an object.');
  }
  return Object.fromEntries(Object.entries(input));
}

export function parseRenderSettings(fields: InputMap, config: JobInputConfig): RenderSettings {
  return {
    videoWidth: coercePositiveInteger(fields.video_width, 'video_width', DEFAULT_VIDEO_WIDTH),
    videoHeight: coercePositiveInteger(fields.video_height, 'video_height', DEFAULT_VIDEO_HEIGHT),
    fps: coercePositiveInteger(fields.fps, 'fps', DEFAULT_FPS),
    bitrateKbps: coercePositiveInteger(fields.bitrate_kbps, 'bitrate_kbps', DEFAULT_BITRATE_KBPS),
    mesh: parseMesh(fields.mesh, config.defaultMesh),
    encoderSpeed: parseEncoderSpeed(fields.encoder_speed, config.defaultEncoderSpeed),
    presetDuration: coercePositiveInteger(fields.preset_duration, 'preset_duration', DEFAULT_PRESET_DURATION),
    timeoutSec: parseTimeoutSec(fields.timeout_sec, config.defaultTimeoutSec)
  };
}

function parseTimeoutSec(value: unknown, fallback: number): number {
  const timeoutSec = coercePositiveNumber(value, 'timeout_sec', fallback);
  if (timeoutSec > MAX_TIMEOUT_SEC) {
    throw new InputError(`Field "timeout_sec" must be at most ${MAX_TIMEOUT_SEC} seconds.`);
  }
  return timeoutSec;
}

/** Inline bytes win over a URL when both are supplied. */
export function parseAudioSource(fields: InputMap, config: JobInputConfig): AudioSource | undefined {
  if (!isBlank(fields.audio_b64)) {
    return { kind: 'inline', base64: parseBase64(fields.audio_b64, 'audio_b64') };
  }

  if (!isBlank(fields.audio_url)) {
    if (!config.allowRemoteAudio) {
      throw new InputError('Remote audio URLs are disabled on this worker.');
    }
    return { kind: 'remote', url: parseHttpUrl(fields.audio_url, 'audio_url') };
  }

  return undefined;
}

export function parseTimelineSource(fields: InputMap): TimelineSource | undefined {
  return parseInlineTimeline(fields) ?? parseTimelineUrl(fields);
}

export function parseInlineTimeline(fields: InputMap): TimelineSource | undefined {
  if (!isBlank(fields.timeline_ini)) {
    if (typeof fields.timeline_ini !== 'string') {
      throw new InputError('Field "timeline_ini" must be a string.');
    }
    return { kind: 'inline', text: fields.timeline_ini };
  }
  return undefined;
}

export function parseTimelineUrl(fields: InputMap): TimelineSource | undefined {
  if (!isBlank(fields.timeline_url)) {
    return { kind: 'remote', url: parseHttpUrl(fields.timeline_url, 'timeline_url') };
  }

  return undefined;
}

/** Local file name for the audio, keeping a safe extension from the caller's hint. */
export function resolveAudioFilename(hint: unknown): string {
  const name = typeof hint === 'string' ? hint.trim() : '';
  const extension = path.extname(name).toLowerCase();
  if (/^\.[a-z0-9]{1,8}$/.test(extension)) {
    return `audio${extension}`;
  }
  return `audio${DEFAULT_AUDIO_EXTENSION}`;
}

export function coercePositiveInteger(value: unknown, fieldName: string, fallback: number): number {
  if (isBlank(value)) {
    return fallback;
  }

  const numeric = toNumber(value);
  if (!Number.isInteger(numeric) || numeric <= 0) {
    throw new InputError(`Field "${fieldName}" must be a positive integer.`);
  }
  return numeric;
}

export function coercePositiveNumber(value: unknown, fieldName: string, fallback: number): number {
  if (isBlank(value)) {
    return fallback;
  }

  const numeric = toNumber(value);
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new InputError(`Field "${fieldName}" must be a positive number.`);
  }
  return numeric;
}

function parseMesh(value: unknown, fallback: string): string {
  const mesh = isBlank(value) ? fallback : value;
  if (typeof mesh !== 'string' || !/^[1-9]\d*x[1-9]\d*$/.test(mesh.trim())) {
    throw new InputError('Field "mesh" must look like <width>x<height>, e.g. 320x240.');
  }
  return mesh.trim();
}

function parseEncoderSpeed(value: unknown, fallback: string): EncoderSpeed {
  const speed = isBlank(value) ? fallback : value;
  const normalized = typeof speed === 'string' ? speed.trim().toLowerCase() : '';
  const match = ENCODER_SPEEDS.find((candidate) => candidate === normalized);
  if (!match) {
    throw new InputError(`Field "encoder_speed" must be one of: ${ENCODER_SPEEDS.join(', ')}.`);
  }
  return match;
}

function parseBase64(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new InputError(`Field "${fieldName}" must be a base64 string.`);
  }

  const payload = value.replace(/^data:[^,]*;base64,/i, '').replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(payload) || Buffer.from(payload, 'base64').length === 0) {
    throw new InputError(`Failed to decode base64 payload in "${fieldName}".`);
  }
  return payload;
}

export function parseHttpUrl(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new InputError(`Field "${fieldName}" must be a valid http/https URL.`);
  }

  const trimmed = value.trim();
  try {
    const parsed = new URL(trimmed);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error('URL must use http or https.');
    }
  } catch {
    throw new InputError(`Field "${fieldName}" must be a valid http/https URL.`);
  }
  return trimmed;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    return Number(value.trim());
  }
  return Number.NaN;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}
