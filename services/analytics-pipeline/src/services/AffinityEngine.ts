import { AnalyticsDatabase, AnalyticsError, TABLES } from '@shopper-insights/shared';

export interface AffinityOptions {
  /** Pairs co-purchased in fewer sessions are dropped inside the aggregation. */
  minSupport: number;
  /** Only rules with lift strictly above this are kept. */
  minLift: number;
}

function assertOptions(options: AffinityOptions): void {
  if (!Number.isInteger(options.minSupport) || options.minSupport < 1) {
    throw new AnalyticsError(`minSupport must be a positive integer, got ${options.minSupport}`, 'INVALID_SETTING', 400);
  }
  if (!Number.isFinite(options.minLift) || options.minLift < 0) {
    throw new AnalyticsError(`minLift must be a non-negative number, got ${options.minLift}`, 'INVALID_SETTING', 400);
  }
}

/**
 * Market-basket rules over purchase sessions. Only the canonical direction
 * (product_a < product_b) is stored. Baskets are deduplicated and filtered to
 * purchases before the self-join, and pair counts are cut by minimum support
 * in the same aggregation.
 */
export function productAffinitySql(options: AffinityOptions): string {
  assertOptions(options);
  return `
CREATE OR REPLACE TABLE ${TABLES.PRODUCT_AFFINITY} AS
WITH baskets AS (
  SELECT DISTINCT session_id, product_id
  FROM ${TABLES.EVENTS}
  WHERE event_type = 'purchase'
    AND session_id IS NOT NULL
    AND product_id IS NOT NULL
),
pairs AS (
  SELECT
    a.product_id AS product_a,
    b.product_id AS product_b,
    COUNT(*) AS pair_count
  FROM baskets a
  JOIN baskets b ON a.session_id = b.session_id AND a.product_id < b.product_id
  GROUP BY 1, 2
  HAVING COUNT(*) >= ${options.minSupport}
),
support AS (
  SELECT product_id, COUNT(*) AS sessions
  FROM baskets
  GROUP BY product_id
),
totals AS (
  SELECT COUNT(DISTINCT session_id) AS total_sessions FROM baskets
),
rules AS (
  SELECT
    p.product_a,
    p.product_b,
    p.pair_count,
    sa.sessions AS support_a,
    sb.sessions AS support_b,
    t.total_sessions,
    CAST(p.pair_count AS DOUBLE) / sa.sessions AS confidence,
    CAST(p.pair_count AS DOUBLE) * t.total_sessions / (CAST(sa.sessions AS DOUBLE) * sb.sessions) AS lift
  FROM pairs p
  JOIN support sa ON p.product_a = sa.product_id
  JOIN support sb ON p.product_b = sb.product_id
  CROSS JOIN totals t
)
SELECT *
FROM rules
WHERE lift > ${options.minLift}
ORDER BY lift DESC, product_a, product_b
`;
}

export async function buildProductAffinity(db: AnalyticsDatabase, options: AffinityOptions): Promise<void> {
  await db.run(productAffinitySql(options));
}
