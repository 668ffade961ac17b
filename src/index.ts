/**
 * Review Status Notifier
 *
 * Entry point for the application.
 * Handles process signals for graceful shutdown.
 */

import type { App } from './app.js';
import { logger } from './logger.js';
import { createApp } from './startup.js';

// Graceful shutdown handler
async function shutdown(app: App, signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    await app.stop(`Received ${signal}`);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

async function main(app: App): Promise<void> {
  // Register signal handlers
  process.on('SIGTERM', () => void shutdown(app, 'SIGTERM'));
  process.on('SIGINT', () => void shutdown(app, 'SIGINT'));

  // Handle uncaught exceptions
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
  });

  try {
    logger.info('='.repeat(50));
    logger.info('Review Status Notifier');
    logger.info('='.repeat(50));

    await app.start();

    // Log status periodically
    setInterval(() => {
      logger.debug('Application status', app.getStatus());
    }, 60000); // Every minute
  } catch (error) {
    logger.error('Failed to start application', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Run; without a valid configuration the process exits with code 1
const app = createApp();
if (app) {
  void main(app);
}
