import { z } from 'zod';
import { AnalyticsDatabase, TABLES } from '@shopper-insights/shared';
import { ChurnStatus } from '../types';

export const CHURN_STATUSES = ['Active', 'At Risk', 'Churned'] as const satisfies readonly ChurnStatus[];

const churnCountRow = z.object({
  status: z.enum(CHURN_STATUSES),
  user_count: z.coerce.number(),
});

export interface RetentionOptions {
  /** Cohorts smaller than this are flagged `is_low_n`, never dropped. */
  minCohortSize: number;
}

export interface ChurnOptions {
  atRiskDays: number;
  churnDays: number;
}

export function weeklyRetentionSql(options: RetentionOptions): string {
  return `
CREATE OR REPLACE TABLE ${TABLES.WEEKLY_RETENTION} AS
WITH user_activity AS (
  SELECT DISTINCT
    u.user_id,
    CAST(date_trunc('week', u.first_seen) AS DATE) AS cohort_week,
    CAST(date_trunc('week', e.event_time) AS DATE) AS activity_week
  FROM ${TABLES.DIM_USERS} u
  JOIN ${TABLES.EVENTS} e ON u.user_id = e.user_id
),
cohort_sizes AS (
  SELECT
    CAST(date_trunc('week', first_seen) AS DATE) AS cohort_week,
    COUNT(DISTINCT user_id) AS cohort_size
  FROM ${TABLES.DIM_USERS}
  GROUP BY 1
)
SELECT
  ua.cohort_week,
  cs.cohort_size,
  date_diff('week', ua.cohort_week, ua.activity_week) AS weeks_since_first,
  COUNT(DISTINCT ua.user_id) AS active_users,
  CAST(COUNT(DISTINCT ua.user_id) AS DOUBLE) / cs.cohort_size AS retention_rate,
  cs.cohort_size < ${Math.max(0, Math.floor(options.minCohortSize))} AS is_low_n
FROM user_activity ua
JOIN cohort_sizes cs ON ua.cohort_week = cs.cohort_week
GROUP BY 1, 2, 3
ORDER BY 1, 3
`;
}

export function churnRiskSql(options: ChurnOptions): string {
  const churnDays = Math.floor(options.churnDays);
  const atRiskDays = Math.floor(options.atRiskDays);
  const [active, atRisk, churned] = CHURN_STATUSES;
  return `
CREATE OR REPLACE TABLE ${TABLES.CHURN_RISK} AS
WITH reference AS (
  SELECT MAX(event_time) AS reference_time FROM ${TABLES.EVENTS}
),
inactivity AS (
  SELECT
    u.user_id,
    u.last_seen,
    date_diff('day', u.last_seen, r.reference_time) AS days_inactive
  FROM ${TABLES.DIM_USERS} u
  CROSS JOIN reference r
)
SELECT
  user_id,
  last_seen,
  days_inactive,
  CASE
    WHEN days_inactive > ${churnDays} THEN '${churned}'
    WHEN days_inactive > ${atRiskDays} THEN '${atRisk}'
    ELSE '${active}'
  END AS status
FROM inactivity
ORDER BY user_id
`;
}

export async function buildRetention(db: AnalyticsDatabase, retention: RetentionOptions, churn: ChurnOptions): Promise<void> {
  await db.transaction(async (tx) => {
    await tx.run(weeklyRetentionSql(retention));
    await tx.run(churnRiskSql(churn));
  });
}

/**
 * Users per churn status, with zero for statuses nobody falls into.
 */
export async function summarizeChurn(db: AnalyticsDatabase): Promise<Record<ChurnStatus, number>> {
  const rows = await db.query(
    `SELECT status, COUNT(*) AS user_count FROM ${TABLES.CHURN_RISK} GROUP BY status`,
    churnCountRow
  );
  const counts: Record<ChurnStatus, number> = { Active: 0, 'At Risk': 0, Churned: 0 };
  for (const row of rows) {
    counts[row.status] = row.user_count;
  }
  return counts;
}
