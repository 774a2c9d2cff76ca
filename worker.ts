#!/usr/bin/env node
/**
 * One-shot job runner: reads a job record (`{ "id": ..., "input": {...} }`)
 * from the file named on the command line, or from stdin, and prints the
 * result map as JSON. The exit code is 0 unless the record is not valid JSON.
 */
import 'dotenv/config';
import fs from 'node:fs/promises';

import { loadConfig } from './render/config';
import { handleJob } from './render/job';
import { createLogger } from './render/logger';
import { createUploader } from './render/uploader';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config, { stderr: true });
  const uploader = createUploader(config, logger);

  const source = process.argv[2];
  const raw = source && source !== '-' ? await fs.readFile(source, 'utf8') : await readStdin();

  let record: unknown;
  try {
    record = JSON.parse(raw);
  } catch (error: unknown) {
    logger.error({ err: error }, 'job record is not valid JSON');
    process.exitCode = 2;
    return;
  }

  const result = await handleJob(record, { config, logger, uploader });
  process.stdout.write(`${JSON.stringify(result)}\n`);
}

main().catch((error: unknown) => {
  process.stderr.write(`render job crashed: ${String(error)}\n`);
  process.exitCode = 1;
});
