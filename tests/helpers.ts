import fs from 'node:fs/promises';
import http from 'node:http';
import type { AddressInfo } from 'node:net';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';

import { loadConfig, type RendererConfig } from '../render/config';
import type { Logger } from '../render/logger';

export const FIXTURES_DIR = path.join(process.cwd(), 'tests', 'fixtures');

export const silentLogger: Logger = pino({ level: 'silent' });

export function fixtureConverter(scriptName: string): RendererConfig['converter'] {
  return { command: 'sh', args: [path.join(FIXTURES_DIR, scriptName)] };
}

export function testConfig(overrides: Partial<RendererConfig> = {}): RendererConfig {
  return {
    ...loadConfig({}),
    presetDir: '/presets',
    textureDir: '/textures',
    converter: fixtureConverter('fake-convert.sh'),
    killGraceMs: 1_000,
    downloadTimeoutMs: 5_000,
    logLevel: 'silent',
    ...overrides
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export type TestServer = {
  url: string;
  close: () => Promise<void>;
};

/** Loopback HTTP server standing in for a remote host. */
export async function startTestServer(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('test server has no TCP address');
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
