export class RenderHttpError extends Error {
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'RenderHttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class InputError extends RenderHttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'InputError';
  }
}

export class DownloadError extends RenderHttpError {
  public readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super(400, message);
    this.name = 'DownloadError';
    this.upstreamStatus = upstreamStatus;
  }
}

type ProcessOutput = {
  stdout: string;
  stderr: string;
};

export class ProcessTimeoutError extends RenderHttpError {
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly timeoutSec: number;

  constructor(timeoutSec: number, output: ProcessOutput) {
    super(504, `Conversion timed out after ${timeoutSec} seconds`);
    this.name = 'ProcessTimeoutError';
    this.timeoutSec = timeoutSec;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

export class ProcessFailureError extends RenderHttpError {
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, output: ProcessOutput) {
    super(500, message);
    this.name = 'ProcessFailureError';
    this.exitCode = exitCode;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

/** Publishing the output failed; the caller falls back to inline bytes. */
export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

export function isProcessError(error: unknown): error is ProcessTimeoutError | ProcessFailureError {
  return error instanceof ProcessTimeoutError || error instanceof ProcessFailureError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
