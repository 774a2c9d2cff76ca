export type InlineAudioSource = {
  kind: 'inline';
  base64: string;
};

export type RemoteAudioSource = {
  kind: 'remote';
  url: string;
};

export type UploadedAudioSource = {
  kind: 'upload';
  path: string;
};

export type AudioSource = InlineAudioSource | RemoteAudioSource | UploadedAudioSource;

export type TimelineSource =
  | { kind: 'inline'; text: string }
  | { kind: 'remote'; url: string }
  | { kind: 'upload'; path: string };

export type EncoderSpeed =
  | 'ultrafast'
  | 'superfast'
  | 'veryfast'
  | 'faster'
  | 'fast'
  | 'medium'
  | 'slow'
  | 'slower'
  | 'veryslow';

export type RenderSettings = {
  videoWidth: number;
  videoHeight: number;
  fps: number;
  bitrateKbps: number;
  mesh: string;
  encoderSpeed: EncoderSpeed;
  presetDuration: number;
  timeoutSec: number;
};

export type JobConfig = {
  audio: AudioSource;
  audioFilename: string;
  timeline?: TimelineSource;
  settings: RenderSettings;
};

export type RenderCommand = {
  command: string;
  args: string[];
};

export type ProcessRun = {
  pid?: number;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  elapsedMs: number;
  timedOut: boolean;
};

export type ConversionSucceeded = {
  status: 'succeeded';
  stdout: string;
  stderr: string;
  elapsedMs: number;
};

export type ConversionFailed = {
  status: 'failed';
  reason: 'exit-code' | 'missing-output' | 'spawn-error';
  message: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  elapsedMs: number;
};

export type ConversionTimedOut = {
  status: 'timed_out';
  timeoutSec: number;
  stdout: string;
  stderr: string;
  elapsedMs: number;
};

export type ConversionOutcome = ConversionSucceeded | ConversionFailed | ConversionTimedOut;

export type RenderOutput =
  | { kind: 'uploaded'; url: string }
  | { kind: 'inline'; base64: string; uploadError: string };

export type RenderSuccess = {
  ok: true;
  output: RenderOutput;
  fileSizeMb: number;
  stdout: string;
  stderr: string;
};

export type RenderFailure = {
  ok: false;
  error: string;
  stdout?: string;
  stderr?: string;
};

export type ResultRecord = RenderSuccess | RenderFailure;

/** Wire shape returned across the job boundary. */
export type JobOutput =
  | {
      video_url: string;
      file_size_mb: number;
      stdout: string;
      stderr: string;
    }
  | {
      base_video_b64: string;
      file_size_mb: number;
      upload_error: string;
      stdout: string;
      stderr: string;
    }
  | {
      error: string;
      stdout?: string;
      stderr?: string;
    };
