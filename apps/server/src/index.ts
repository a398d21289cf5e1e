/**
 * Server Entry Point
 *
 * Loads the configured packages, then serves them until signalled.
 */

import { createServer } from './server.js';
import { loadPackages } from './startup.js';
import { config } from './config/index.js';
import { logger } from './lib/logger.js';

async function main(): Promise<void> {
  try {
    const { app, content } = await loadPackages(config.appPackage, config.contentPackage);
    logger.info({ app: config.appPackage, content: config.contentPackage, type: content.type }, 'Packages loaded');

    const server = await createServer({ app, content, logger });

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    for (const signal of signals) {
      process.on(signal, async () => {
        logger.info({ signal }, 'Received shutdown signal');

        try {
          await server.close();
          logger.info('Server closed gracefully');
          process.exit(0);
        } catch (err) {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      host: config.host,
      port: config.port,
      env: config.nodeEnv,
    }, 'Server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
