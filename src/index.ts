#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { SlateServer, createToolContext } from './server.js';
import { describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const context = await createToolContext(config);
  const server = new SlateServer(context);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Error during shutdown', { error: describeError(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

main().catch(error => {
  logger.error('Fatal error starting server', { error: describeError(error) });
  process.exit(1);
});
