import { AnalyticsDatabase, TABLES } from '@shopper-insights/shared';

// A session belongs to the smallest user_id seen in it
export const FACT_SESSIONS_SQL = `
CREATE OR REPLACE TABLE ${TABLES.FACT_SESSIONS} AS
SELECT
  session_id,
  MIN(user_id) AS user_id,
  MIN(event_time) AS session_start,
  MAX(event_time) AS session_end,
  date_diff('second', MIN(event_time), MAX(event_time)) AS duration_sec,
  COUNT(*) AS event_count,
  COUNT(DISTINCT product_id) AS unique_products,
  BOOL_OR(event_type = 'view') AS has_view,
  BOOL_OR(event_type = 'cart') AS has_cart,
  BOOL_OR(event_type = 'remove_from_cart') AS has_remove,
  BOOL_OR(event_type = 'purchase') AS has_purchase,
  COALESCE(SUM(price) FILTER (WHERE event_type = 'purchase'), 0) AS session_revenue
FROM ${TABLES.EVENTS}
WHERE session_id IS NOT NULL
GROUP BY session_id
ORDER BY session_start, session_id
`;

export async function buildSessions(db: AnalyticsDatabase): Promise<void> {
  await db.run(FACT_SESSIONS_SQL);
}
