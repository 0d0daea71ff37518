// Load environment variables from root .env file
import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, '../../../.env') });

import { createLogger, loadConfig } from '@ragkit/core';
import { createRagService } from '@ragkit/engine';
import { createApp } from './app';

const logger = createLogger('api-server');

const appConfig = loadConfig();
const { rag, indexer } = createRagService(appConfig);
const app = createApp({
  rag,
  indexer,
  corsOrigins: appConfig.server.corsOrigins
});

const server = app.listen(appConfig.server.port, () => {
  logger.info({ port: appConfig.server.port, capabilities: rag.status() }, 'API server started');
});

// Graceful shutdown
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    logger.info(`${signal} received`);
    server.close(() => process.exit(0));
  });
}
