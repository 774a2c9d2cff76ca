import fs from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from './logger';

/**
 * Runs `task` inside a freshly created directory under `root` that belongs
 * to this job alone, and removes it on every exit path.
 */
export async function withWorkspace<T>(
  root: string,
  prefix: string,
  logger: Logger,
  task: (workDir: string) => Promise<T>
): Promise<T> {
  await fs.mkdir(root, { recursive: true });
  const workDir = await fs.mkdtemp(path.join(root, prefix));

  try {
    return await task(workDir);
  } finally {
    await fs.rm(workDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
      logger.error({ err: cleanupError, workDir }, 'workspace cleanup failed');
    });
  }
}
