import { Router, Request, Response } from 'express';
import { HealthChecker, describeError, createServiceLogger } from '@shopper-insights/shared';

const logger = createServiceLogger('insights-api');

export const createHealthRoutes = (healthChecker: HealthChecker): Router => {
  const router = Router();

  // GET /health - Liveness
  router.get('/', (req: Request, res: Response) => {
    res.status(200).json({
      ...healthChecker.checkLiveness(),
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/detailed - Database, published tables and memory
  router.get('/detailed', async (req: Request, res: Response) => {
    try {
      const health = await healthChecker.performHealthCheck();
      res.status(health.status === 'healthy' ? 200 : 503).json(health);
    } catch (error) {
      logger.error('Health check failed', { error: describeError(error) });
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: describeError(error),
      });
    }
  });

  return router;
};
