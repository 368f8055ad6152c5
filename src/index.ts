/**
 * Validation Process Service
 *
 * Accepts subject identifiers for validation, runs the validation in the
 * background and lets callers poll for the outcome. Running this module
 * starts the HTTP server; importing the package exposes the building
 * blocks for programmatic use.
 */

import { AppConfig, ConfigError, loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext, shutdown } from './server';

function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', { errors: err.errors });
      process.exitCode = 1;
      return;
    }
    throw err;
  }
  setLogLevel(config.logLevel);

  const context = createAppContext(config);
  const app = createApp(context);
  const server = app.listen(config.port, () => {
    logger.info('Server listening', {
      port: config.port,
      storage: config.storage,
      validationMode: config.validationMode,
      maxConcurrency: config.engine.maxConcurrency,
    });
  });

  let closing = false;
  const close = (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info('Received signal', { signal });
    server.close();
    shutdown(context)
      .then(() => {
        logger.info('Shutdown complete');
      })
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
      });
  };
  process.on('SIGTERM', () => close('SIGTERM'));
  process.on('SIGINT', () => close('SIGINT'));
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext, shutdown } from './server';
export * from './config';
export * from './domain';
export * from './engine/state-machine';
export * from './engine/retry';
export * from './engine/execution-engine';
export * from './engine/orchestrator';
export * from './storage/store';
export * from './storage/memory-store';
export * from './storage/sqlite-store';
export * from './storage/record-seed';
export * from './validation/identifier-validator';
export * from './validation/validation-logic';
export * from './data-plane/publisher';
export * from './notifications/webhook';
export * from './logger';
