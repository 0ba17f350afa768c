import { createApp } from './app';
import { createContainer, createSupabaseStores } from './container';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, getSupabaseClient, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */
async function startServer(): Promise<void> {
  // Verify database connection before starting server
  if (!(await testConnection())) {
    throw new Error('Database connection failed');
  }

  const container = createContainer(createSupabaseStores(getSupabaseClient()), {
    jwtSecret: env.JWT_SECRET,
    lockTimeoutMs: env.LOCK_TIMEOUT_MS,
    maxAttempts: env.TRANSITION_MAX_ATTEMPTS,
  });
  const app = createApp(container);

  const server = app.listen(env.PORT, () => {
    logger.info('Fabric Order Ledger API listening', {
      environment: env.NODE_ENV,
      port: env.PORT,
      docs: `http://localhost:${env.PORT}/docs`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      closeConnection();
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
