import { Request, Response, NextFunction } from 'express';
import promClient from 'prom-client';

export interface InsightsMetrics {
  register: promClient.Registry;
  httpRequestDuration: promClient.Histogram<'method' | 'route' | 'status_code'>;
  httpRequestsTotal: promClient.Counter<'method' | 'route' | 'status_code'>;
  unpublishedTableResponses: promClient.Counter<'route'>;
}

/**
 * A registry per app, so tests can build several apps in one process.
 */
export const createMetrics = (): InsightsMetrics => {
  const register = new promClient.Registry();

  promClient.collectDefaultMetrics({
    register,
    prefix: 'insights_api_',
  });

  const httpRequestDuration = new promClient.Histogram({
    name: 'insights_api_http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
    registers: [register],
  });

  const httpRequestsTotal = new promClient.Counter({
    name: 'insights_api_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [register],
  });

  const unpublishedTableResponses = new promClient.Counter({
    name: 'insights_api_unpublished_table_responses_total',
    help: 'Responses served with placeholders because a pipeline table was missing',
    labelNames: ['route'] as const,
    registers: [register],
  });

  return { register, httpRequestDuration, httpRequestsTotal, unpublishedTableResponses };
};

export const metricsMiddleware = (metrics: InsightsMetrics) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - startTime) / 1000;
      const route = req.route?.path || req.path;
      const statusCode = res.statusCode.toString();

      metrics.httpRequestDuration.labels(req.method, route, statusCode).observe(duration);
      metrics.httpRequestsTotal.labels(req.method, route, statusCode).inc();
    });

    next();
  };
};
