import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { AnalyticsDatabase, AppConfig, HealthChecker, SERVICE_NAMES, TABLES, API_VERSION } from '@shopper-insights/shared';
import { InsightsRepository } from './services/InsightsRepository';
import { createHealthRoutes } from './routes/health';
import { createInsightsRoutes } from './routes/insights';
import { createMetrics, metricsMiddleware } from './middleware/metrics';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { skipLogger } from './middleware/requestLogger';

export const createApp = (db: AnalyticsDatabase, config: AppConfig): Express => {
  const app = express();
  const metrics = config.METRICS_ENABLED ? createMetrics() : undefined;

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.ALLOWED_ORIGINS?.split(',').map((origin) => origin.trim()) || ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Rate limiting
  if (config.RATE_LIMIT_ENABLED) {
    const limiter = rateLimit({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      limit: config.RATE_LIMIT_MAX_REQUESTS,
      message: {
        error: 'Too many requests from this IP',
        retryAfter: Math.ceil(config.RATE_LIMIT_WINDOW_MS / 1000),
      },
      standardHeaders: true,
      legacyHeaders: false,
    });
    app.use(`/${API_VERSION}`, limiter);
  }

  app.use(express.json({ limit: '1mb' }));

  // Middleware
  app.use(skipLogger(['/health', '/metrics']));
  if (metrics) {
    app.use(metricsMiddleware(metrics));
  }

  // Routes
  const healthChecker = new HealthChecker(SERVICE_NAMES.INSIGHTS_API, db, Object.values(TABLES));
  app.use('/health', createHealthRoutes(healthChecker));
  app.use(`/${API_VERSION}`, createInsightsRoutes(new InsightsRepository(db), metrics));

  // Metrics endpoint
  if (metrics) {
    app.get('/metrics', async (req, res, next) => {
      try {
        res.set('Content-Type', metrics.register.contentType);
        res.end(await metrics.register.metrics());
      } catch (error) {
        next(error);
      }
    });
  }

  // 404 and error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
