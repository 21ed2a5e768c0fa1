import { AnalyticsDatabase, TABLES } from '@shopper-insights/shared';

export const FACT_DAILY_KPIS_SQL = `
CREATE OR REPLACE TABLE ${TABLES.FACT_DAILY_KPIS} AS
SELECT
  CAST(event_time AS DATE) AS date,
  COUNT(*) AS total_events,
  COUNT(DISTINCT user_id) AS dau,
  COUNT(DISTINCT session_id) AS daily_sessions,
  COUNT(*) FILTER (WHERE event_type = 'view') AS total_views,
  COUNT(*) FILTER (WHERE event_type = 'cart') AS total_carts,
  COUNT(*) FILTER (WHERE event_type = 'remove_from_cart') AS total_removes,
  COUNT(*) FILTER (WHERE event_type = 'purchase') AS total_purchases,
  COALESCE(SUM(price) FILTER (WHERE event_type = 'purchase'), 0) AS daily_revenue
FROM ${TABLES.EVENTS}
GROUP BY 1
ORDER BY 1
`;

export async function buildDailyKpis(db: AnalyticsDatabase): Promise<void> {
  await db.run(FACT_DAILY_KPIS_SQL);
}
