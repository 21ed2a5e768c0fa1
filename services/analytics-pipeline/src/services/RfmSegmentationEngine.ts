import { z } from 'zod';
import { AnalyticsDatabase, FrequencyBasis, TABLES } from '@shopper-insights/shared';
import { SegmentSummary } from '../types';
import { segmentCaseExpression } from './SegmentRules';

export interface RfmOptions {
  quantileCount: 5;
  frequencyBasis: FrequencyBasis;
}

const FREQUENCY_EXPRESSIONS: Record<FrequencyBasis, string> = {
  purchase_events: 'COUNT(*)',
  purchase_days: 'COUNT(DISTINCT CAST(event_time AS DATE))',
};

/**
 * Recency is measured against the latest event in the store, not wall-clock
 * time. Quantile ties are broken by user_id.
 */
export function rfmSegmentsSql(options: RfmOptions): string {
  const n = options.quantileCount;
  return `
CREATE OR REPLACE TABLE ${TABLES.RFM_SEGMENTS} AS
WITH reference AS (
  SELECT MAX(event_time) AS reference_time FROM ${TABLES.EVENTS}
),
rfm_base AS (
  SELECT
    e.user_id,
    date_diff('day', MAX(e.event_time), ANY_VALUE(r.reference_time)) AS recency_days,
    ${FREQUENCY_EXPRESSIONS[options.frequencyBasis]} AS frequency,
    SUM(e.price) AS monetary
  FROM ${TABLES.EVENTS} e
  CROSS JOIN reference r
  WHERE e.event_type = 'purchase'
  GROUP BY e.user_id
),
scores AS (
  SELECT
    user_id,
    recency_days,
    frequency,
    monetary,
    ${n + 1} - NTILE(${n}) OVER (ORDER BY recency_days ASC, user_id ASC) AS r_score,
    NTILE(${n}) OVER (ORDER BY frequency ASC, user_id ASC) AS f_score,
    NTILE(${n}) OVER (ORDER BY monetary ASC, user_id ASC) AS m_score
  FROM rfm_base
)
SELECT
  user_id,
  recency_days,
  frequency,
  monetary,
  r_score,
  f_score,
  m_score,
  CAST(r_score AS VARCHAR) || CAST(f_score AS VARCHAR) || CAST(m_score AS VARCHAR) AS rfm_code,
  ${segmentCaseExpression('r_score', 'f_score')} AS segment_name
FROM scores
ORDER BY user_id
`;
}

export async function buildRfmSegments(db: AnalyticsDatabase, options: RfmOptions): Promise<void> {
  await db.run(rfmSegmentsSql(options));
}

const segmentSummaryRow = z.object({
  segment_name: z.string(),
  user_count: z.coerce.number(),
  avg_spend: z.coerce.number(),
  avg_recency: z.coerce.number(),
});

/**
 * Buyers per segment with their share of all buyers, ordered by average spend.
 */
export async function summarizeSegments(db: AnalyticsDatabase): Promise<SegmentSummary[]> {
  const rows = await db.query(
    `
    SELECT
      segment_name,
      COUNT(*) AS user_count,
      ROUND(AVG(monetary), 2) AS avg_spend,
      ROUND(AVG(recency_days), 1) AS avg_recency
    FROM ${TABLES.RFM_SEGMENTS}
    GROUP BY 1
    ORDER BY avg_spend DESC, segment_name
    `,
    segmentSummaryRow
  );

  const totalBuyers = rows.reduce((sum, row) => sum + row.user_count, 0);
  return rows.map((row) => ({
    ...row,
    pct_buyers: totalBuyers === 0 ? 0 : Math.round((row.user_count / totalBuyers) * 1000) / 10,
  }));
}
