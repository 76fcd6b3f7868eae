#!/usr/bin/env node

import dotenv from 'dotenv';
import { getConfig, getPrivateKey } from './config';
import { RelayerApp } from './app';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

// Build and start the app; null when startup fails
async function startRelayer(): Promise<RelayerApp | null> {
  try {
    logger.info('Starting bridge relayer');

    const privateKey = getPrivateKey();

    // Load and validate configuration
    const config = getConfig();
    logger.info('Configuration loaded', {
      source: config.source.name,
      destination: config.destination.name,
      pollingIntervalMs: config.pollingIntervalMs,
      maxWindowSize: config.maxWindowSize,
      confirmationLag: config.confirmationLag
    });

    const app = new RelayerApp(config, privateKey);
    await app.start();
    return app;
  } catch (error) {
    logger.error(`Failed to start relayer: ${describeError(error)}`);
    return null;
  }
}

// Main entry point
async function main() {
  const app = await startRelayer();
  if (!app) {
    return process.exit(1);
  }

  setupShutdownHandlers(app);
  logger.info('Relayer is running');

  await app.done();
  logger.info('Relayer stopped', { state: app.state });
  process.exit(0);
}

// Set up handlers for graceful shutdown
function setupShutdownHandlers(app: RelayerApp) {
  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down relayer...', { state: app.state });
    app.stop().catch((error: unknown) => {
      logger.error(`Error during shutdown: ${describeError(error)}`);
      process.exit(1);
    });
  };

  // Handle termination signals
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Start the application
main().catch((error: unknown) => {
  logger.error(`Fatal error: ${describeError(error)}`, {
    stack: error instanceof Error ? error.stack : undefined
  });
  process.exit(1);
});
