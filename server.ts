import 'dotenv/config';

import { createApp } from './render/app';
import { loadConfig } from './render/config';
import { createLogger } from './render/logger';
import { LocalOutputPublisher, createUploader } from './render/uploader';

const config = loadConfig();
const logger = createLogger(config);
const uploader = createUploader(config, logger);
const app = createApp({ config, logger, uploader });

app.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      converter: config.converter.command,
      uploadMode: config.uploadMode,
      auth: config.authToken ? 'bearer' : 'disabled'
    },
    'render worker listening'
  );
});

if (uploader instanceof LocalOutputPublisher) {
  uploader.ensureRoot().catch((error: unknown) => {
    logger.error({ err: error }, 'failed to prepare output directory');
  });
  uploader.startCleanup(config.outputCleanupIntervalMs);
}
