import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { logger, initializeLogger } from './middleware/logging.js';

initializeLogger();

const app = new App();
const shutdownTimeoutMs = ConfigManager.getInstance().getServerConfig().shutdownTimeoutSeconds * 1000;

let shuttingDown = false;

/**
 * Stop the app, forcing exit if it takes longer than the shutdown timeout
 */
function shutdown(reason: string, exitCode: number): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  const forceExit = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit', { reason, timeoutMs: shutdownTimeoutMs });
    process.exit(1);
  }, shutdownTimeoutMs);
  forceExit.unref();

  app.stop()
    .then(() => {
      clearTimeout(forceExit);
      process.exit(exitCode);
    })
    .catch((shutdownError: unknown) => {
      logger.error('Failed to gracefully shutdown', { reason, shutdownError });
      process.exit(1);
    });
}

// Graceful shutdown handling
process.on('SIGTERM', () => {
  logger.info('Received SIGTERM signal, shutting down gracefully');
  shutdown('SIGTERM', 0);
});

process.on('SIGINT', () => {
  logger.info('Received SIGINT signal, shutting down gracefully');
  shutdown('SIGINT', 0);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });
  shutdown('unhandledRejection', 1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected - this indicates a bug that must be fixed', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
  shutdown('uncaughtException', 1);
});

// Start the application
app.start().catch((error: unknown) => {
  logger.error('Failed to start application', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
