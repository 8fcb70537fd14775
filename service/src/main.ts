/**
 * Process entry: load configuration, open and bootstrap the catalog, serve.
 * Run with `npm start`.
 */

import { serve } from '@hono/node-server';
import { CorruptedCatalogError, createLogger } from '@fibermeta/core';
import { createApp } from './index.js';
import { ConfigError, loadConfig } from './config.js';
import { openServiceStore } from './store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, name: 'fibermeta' });

  const store = await openServiceStore(config, logger);

  const server = serve({ fetch: createApp(store, logger).fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info({ host: config.host, port: info.port }, 'catalog service listening');
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'shutting down');
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'failed to close catalog store');
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError || error instanceof CorruptedCatalogError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exit(1);
});
