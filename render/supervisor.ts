import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';

import { MAX_TIMER_MS } from './config';
import { getErrorMessage } from './errors';
import { tailText, type Logger } from './logger';
import type { ConversionOutcome, ProcessRun, RenderCommand } from './types';

export type RunProcessOptions = {
  timeoutMs?: number;
  killGraceMs?: number;
};

const DEFAULT_KILL_GRACE_MS = 5_000;

/**
 * Spawns `command` and drains both pipes while it runs. On timeout the
 * child's whole process group is SIGKILLed and the run resolves with
 * whatever output was captured. Rejects only when the spawn itself fails.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {}
): Promise<ProcessRun> {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const useProcessGroup = process.platform !== 'win32';
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: useProcessGroup
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;
    let exitCode: number | null = null;
    let exitSignal: NodeJS.Signals | null = null;
    let graceTimer: NodeJS.Timeout | undefined;

    child.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    const killTree = () => {
      if (child.pid === undefined) {
        return;
      }
      try {
        if (useProcessGroup) {
          process.kill(-child.pid, 'SIGKILL');
        } else {
          child.kill('SIGKILL');
        }
      } catch {
        // group leader already reaped
        child.kill('SIGKILL');
      }
    };

    const timeoutMs = Math.min(options.timeoutMs || 0, MAX_TIMER_MS);
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            killTree();
          }, timeoutMs)
        : undefined;

    const finish = () => {
      if (settled) {
        return;
      }
      settled = true;
      if (timeout) {
        clearTimeout(timeout);
      }
      if (graceTimer) {
        clearTimeout(graceTimer);
      }
      resolve({
        pid: child.pid,
        exitCode,
        signal: exitSignal,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        elapsedMs: Date.now() - startedAt,
        timedOut
      });
    };

    child.on('error', (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timeout) {
        clearTimeout(timeout);
      }
      reject(error);
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      exitCode = code;
      exitSignal = signal;
      if (!timedOut) {
        return;
      }
      // A grandchild outside the group may still hold the pipes open.
      graceTimer = setTimeout(() => {
        child.stdout.destroy();
        child.stderr.destroy();
        finish();
      }, Math.min(options.killGraceMs ?? DEFAULT_KILL_GRACE_MS, MAX_TIMER_MS));
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      exitCode = code;
      exitSignal = signal;
      finish();
    });
  });
}

export type SuperviseOptions = {
  timeoutSec: number;
  killGraceMs?: number;
  logger: Logger;
  logTailChars?: number;
};

/** Runs the converter and classifies the run; never rejects. */
export async function superviseConversion(
  command: RenderCommand,
  outputPath: string,
  options: SuperviseOptions
): Promise<ConversionOutcome> {
  const { logger, timeoutSec } = options;
  const tailChars = options.logTailChars ?? 1200;

  let run: ProcessRun;
  try {
    run = await runProcess(command.command, command.args, {
      timeoutMs: Math.ceil(timeoutSec * 1000),
      killGraceMs: options.killGraceMs
    });
  } catch (error: unknown) {
    logger.error({ err: error }, 'converter could not be started');
    return {
      status: 'failed',
      reason: 'spawn-error',
      message: `Unexpected conversion failure: ${getErrorMessage(error)}`,
      exitCode: null,
      stdout: '',
      stderr: '',
      elapsedMs: 0
    };
  }

  const { stdout, stderr, elapsedMs } = run;

  if (run.timedOut) {
    logger.error({ timeoutSec, pid: run.pid }, `conversion timed out after ${timeoutSec} seconds`);
    return { status: 'timed_out', timeoutSec, stdout, stderr, elapsedMs };
  }

  if (run.exitCode !== 0) {
    const message =
      run.exitCode === null
        ? `Conversion failed (signal ${run.signal ?? 'unknown'})`
        : `Conversion failed (exit code ${run.exitCode})`;
    logger.error(
      {
        exitCode: run.exitCode,
        signal: run.signal,
        stdout: tailText(stdout, tailChars),
        stderr: tailText(stderr, tailChars)
      },
      message
    );
    return { status: 'failed', reason: 'exit-code', message, exitCode: run.exitCode, stdout, stderr, elapsedMs };
  }

  if (!(await isFile(outputPath))) {
    logger.error('output missing after conversion');
    return {
      status: 'failed',
      reason: 'missing-output',
      message: 'Conversion completed but output file is missing',
      exitCode: 0,
      stdout,
      stderr,
      elapsedMs
    };
  }

  logger.info(
    {
      elapsedSec: Number((elapsedMs / 1000).toFixed(1)),
      stdout: tailText(stdout, tailChars),
      stderr: tailText(stderr, tailChars)
    },
    'conversion completed'
  );
  return { status: 'succeeded', stdout, stderr, elapsedMs };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
