/**
 * Entrypoint — main entry point for the keybind license server
 *
 * Orchestrates:
 *   1. Structured logger initialization
 *   2. Environment validation and key store creation
 *   3. HTTP server creation and startup
 *   4. Graceful shutdown on SIGTERM/SIGINT
 */

import { serve } from '@hono/node-server';

import { createKeyStore } from '../../../api/src/index.js';
import { EnvValidationError, loadRuntimeConfig } from './config.js';
import { initLogger, logger } from './logger.js';
import { createApp } from './server.js';

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  // 1. Initialize structured logger
  initLogger({
    level: process.env.LOG_LEVEL,
    service: process.env.SERVICE_NAME ?? 'keybind',
  });

  // 2. Load configuration (throws EnvValidationError)
  const config = loadRuntimeConfig();
  initLogger({ level: config.logLevel, service: config.serviceName });
  logger.info(`Starting keybind license server (store=${config.store.backend})`);
  logger.info(`Node.js ${process.version}, platform=${process.platform}`);
  if (!config.adminToken) {
    logger.warn('ADMIN_TOKEN not set; admin API is disabled');
  }

  // 3. Create key store
  const store = createKeyStore(config.store);

  // 4. Start HTTP server
  const { app, markReady } = createApp({ store, adminToken: config.adminToken });

  const httpServer = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  logger.info(`HTTP server listening on ${config.host}:${config.port}`);

  markReady();
  logger.info('Startup complete, ready to serve requests');

  // 5. Graceful shutdown
  let isShuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Received ${signal}, starting graceful shutdown`);

    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
      // Force close after 15s
      setTimeout(() => {
        logger.warn('HTTP server close timed out, forcing shutdown');
        resolve();
      }, 15_000).unref();
    });

    if (store.close) {
      await store.close().catch((err: unknown) => {
        logger.error('Error closing key store:', err);
      });
    }

    logger.info('Graceful shutdown complete');
    process.exit(0);
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((err: unknown) => {
  if (err instanceof EnvValidationError) {
    logger.error(err.message);
  } else {
    logger.error('Fatal startup error:', err);
  }
  process.exit(1);
});
