import { SERVICE_NAMES, createServiceLogger, describeError, loadConfig } from '@shopper-insights/shared';
import { createApp } from './app';
import { openInsightsDatabase } from './database';

const logger = createServiceLogger(SERVICE_NAMES.INSIGHTS_API);

const SHUTDOWN_TIMEOUT_MS = 30000;

const start = async (): Promise<void> => {
  const config = loadConfig();

  // The dashboard never writes; the pipeline owns the database file
  const db = await openInsightsDatabase(config);

  if (!(await db.healthCheck())) {
    await db.close();
    throw new Error(`Database at ${config.DUCKDB_PATH} failed its initial health check`);
  }

  const app = createApp(db, config);

  const server = app.listen(config.INSIGHTS_API_PORT, config.INSIGHTS_API_HOST, () => {
    logger.info('Insights API started successfully', {
      url: `http://${config.INSIGHTS_API_HOST}:${config.INSIGHTS_API_PORT}`,
      database: config.DUCKDB_PATH,
      environment: config.NODE_ENV,
      pid: process.pid,
    });
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.error(`Port ${config.INSIGHTS_API_PORT} is already in use`);
    } else {
      logger.error('Server error', { error: describeError(error) });
    }
    process.exitCode = 1;
  });

  // Graceful shutdown
  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    const forceExit = setTimeout(() => {
      logger.error('Forcing shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close(() => {
      logger.info('HTTP server closed');
      db.close()
        .then(() => {
          logger.info('Graceful shutdown complete');
        })
        .catch((error: unknown) => {
          logger.error('Error during graceful shutdown', { error: describeError(error) });
          process.exitCode = 1;
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
};

start().catch((error: unknown) => {
  logger.error('Failed to start Insights API', { error: describeError(error) });
  process.exitCode = 1;
});
