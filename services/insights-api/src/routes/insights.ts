import { Router, Request, Response } from 'express';
import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { InsightsRepository } from '../services/InsightsRepository';
import { asyncHandler, createError } from '../middleware/errorHandler';
import { InsightsMetrics } from '../middleware/metrics';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => isValid(parseISO(value)), 'not a calendar date');

export const dailyKpiQuery = z
  .object({
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine((range) => !range.from || !range.to || range.from <= range.to, {
    message: 'from must not be after to',
    path: ['from'],
  });

export const retentionQuery = z.object({
  maxWeeks: z.coerce.number().int().min(0).max(520).optional(),
});

export const affinityQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

const INT64_MAX = 2n ** 63n - 1n;

// Kept as text until bound so ids past Number.MAX_SAFE_INTEGER stay exact
const userParams = z.object({
  userId: z
    .string()
    .regex(/^\d+$/)
    .transform((value) => BigInt(value))
    .refine((value) => value <= INT64_MAX),
});

export const createInsightsRoutes = (repository: InsightsRepository, metrics?: InsightsMetrics): Router => {
  const router = Router();

  const countPlaceholder = (route: string, available: boolean) => {
    if (!available) {
      metrics?.unpublishedTableResponses.labels(route).inc();
    }
  };

  // GET /v1/overview - Headline totals
  router.get(
    '/overview',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await repository.getOverview());
    })
  );

  // GET /v1/kpis/daily - Daily time series, optionally bounded
  router.get(
    '/kpis/daily',
    asyncHandler(async (req: Request, res: Response) => {
      const range = dailyKpiQuery.parse(req.query);
      const result = await repository.getDailyKpis(range);
      countPlaceholder('/kpis/daily', result.available);
      res.json(result);
    })
  );

  // GET /v1/funnel - Session funnel counts and conversion rates
  router.get(
    '/funnel',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await repository.getFunnel();
      countPlaceholder('/funnel', result.available);
      res.json(result);
    })
  );

  // GET /v1/segments - RFM segment distribution
  router.get(
    '/segments',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await repository.getSegments();
      countPlaceholder('/segments', result.available);
      res.json(result);
    })
  );

  // GET /v1/retention - Cohort retention matrix
  router.get(
    '/retention',
    asyncHandler(async (req: Request, res: Response) => {
      const { maxWeeks } = retentionQuery.parse(req.query);
      const result = await repository.getRetention(maxWeeks);
      countPlaceholder('/retention', result.available);
      res.json(result);
    })
  );

  // GET /v1/churn - Users per churn status
  router.get(
    '/churn',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await repository.getChurn();
      countPlaceholder('/churn', result.available);
      res.json(result);
    })
  );

  // GET /v1/affinity - Strongest co-purchase rules
  router.get(
    '/affinity',
    asyncHandler(async (req: Request, res: Response) => {
      const { limit } = affinityQuery.parse(req.query);
      const result = await repository.getAffinity(limit);
      countPlaceholder('/affinity', result.available);
      res.json(result);
    })
  );

  // GET /v1/users/:userId/features - One row of the feature store
  router.get(
    '/users/:userId/features',
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = userParams.safeParse(req.params);
      if (!parsed.success) {
        throw createError(`Validation Error: userId must be an integer, got '${req.params.userId}'`, 400, 'VALIDATION_ERROR');
      }
      res.json(await repository.getUserFeatures(parsed.data.userId));
    })
  );

  return router;
};
