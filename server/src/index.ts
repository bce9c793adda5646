/**
 * Service Provider Manager
 *
 * Main entry point: provider registry API plus the background health monitor.
 */

import { createServer } from 'http';
import { createApp } from './app';
import { getConfig } from './config';
import type { AppConfig } from './config';
import { closeDatabase, openDatabase } from './models/database';
import { ProviderRepository } from './repositories';
import { HealthMonitor } from './services/healthCheck';
import { ProviderService } from './services/providerService';
import { createLogger, extractError, setLogLevel } from './utils/logger';
import { getErrorMessage } from './utils/errors';

const log = createLogger('SERVER');

// ========================================
// GLOBAL EXCEPTION HANDLERS
// ========================================

process.on('uncaughtException', (error: Error) => {
  log.error('Uncaught exception - process will exit', {
    error: error.message,
    stack: error.stack,
  });
  // Give time for logs to flush
  setTimeout(() => process.exit(1), 1000);
});

process.on('unhandledRejection', (reason: unknown) => {
  log.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

function loadConfigOrExit(): AppConfig {
  try {
    return getConfig();
  } catch (error) {
    console.error('FATAL: Invalid configuration');
    console.error(getErrorMessage(error));
    process.exit(1);
  }
}

const config = loadConfigOrExit();

setLogLevel(config.logging.level);

const db = openDatabase(config.database.path);
const repository = new ProviderRepository(db);
const providerService = new ProviderService(repository);
const monitor = new HealthMonitor({ directory: repository, config: config.healthCheck });

const app = createApp({ providerService, monitor });
const httpServer = createServer(app);

httpServer.listen(config.server.port, () => {
  log.info(`Server listening on port ${config.server.port}`, {
    environment: config.server.nodeEnv,
    database: config.database.path,
  });
  monitor.start();
});

// ========================================
// GRACEFUL SHUTDOWN
// ========================================

const SHUTDOWN_TIMEOUT_MS = 30000;
let isShuttingDown = false;

const handleShutdown = async (signal: string): Promise<void> => {
  if (isShuttingDown) {
    log.warn(`${signal} received again, already shutting down...`);
    return;
  }
  isShuttingDown = true;

  log.info(`${signal} received, starting graceful shutdown (${SHUTDOWN_TIMEOUT_MS / 1000}s timeout)...`);

  const forceExitTimeout = setTimeout(() => {
    log.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimeout.unref();

  // Stop probing before the database goes away
  await monitor.stop();

  httpServer.close((error?: Error) => {
    if (error) {
      log.error('Error closing HTTP server', extractError(error));
    }

    try {
      closeDatabase(db);
    } catch (closeError) {
      log.error('Error closing database', extractError(closeError));
    }

    clearTimeout(forceExitTimeout);
    log.info('Server closed gracefully');
    process.exit(error ? 1 : 0);
  });
};

process.on('SIGTERM', () => {
  handleShutdown('SIGTERM').catch((error: unknown) => {
    log.error('Shutdown failed', extractError(error));
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  handleShutdown('SIGINT').catch((error: unknown) => {
    log.error('Shutdown failed', extractError(error));
    process.exit(1);
  });
});

export default app;
