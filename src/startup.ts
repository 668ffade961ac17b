import { App } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

/**
 * Build the application from the environment.
 *
 * On a configuration error nothing is constructed: the error is logged,
 * `process.exitCode` is set to 1 and undefined is returned. Exit is left
 * to the event loop draining so winston can flush its file transports.
 */
export function createApp(env: Record<string, string | undefined> = process.env): App | undefined {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    logger.error(error.message, { missing: error.missing });
    process.exitCode = 1;
    return undefined;
  }

  return new App(config);
}
