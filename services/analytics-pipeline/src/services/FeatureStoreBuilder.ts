import { AnalyticsDatabase, NON_BUYER_DEFAULTS, TABLES } from '@shopper-insights/shared';

// Users missing from the RFM or session tables get the non-buyer sentinels and zeroed rates
export const FEATURES_USERS_SQL = `
CREATE OR REPLACE TABLE ${TABLES.FEATURES_USERS} AS
WITH session_features AS (
  SELECT
    user_id,
    COUNT(*) AS total_sessions,
    AVG(duration_sec) AS avg_session_duration,
    COALESCE(STDDEV_SAMP(duration_sec), 0) AS std_session_duration,
    AVG(event_count) AS avg_events_per_session,
    CAST(COUNT(*) FILTER (WHERE has_cart) AS DOUBLE) / COUNT(*) AS cart_rate,
    CASE
      WHEN COUNT(*) FILTER (WHERE has_cart) = 0 THEN 0
      ELSE CAST(COUNT(*) FILTER (WHERE has_purchase) AS DOUBLE) / COUNT(*) FILTER (WHERE has_cart)
    END AS checkout_rate
  FROM ${TABLES.FACT_SESSIONS}
  GROUP BY user_id
)
SELECT
  u.user_id,
  u.total_spend,
  u.purchase_count,
  u.event_count,
  u.first_seen,
  u.last_seen,
  COALESCE(r.recency_days, ${NON_BUYER_DEFAULTS.RECENCY_DAYS}) AS recency_days,
  COALESCE(r.frequency, ${NON_BUYER_DEFAULTS.FREQUENCY}) AS frequency_raw,
  COALESCE(r.monetary, ${NON_BUYER_DEFAULTS.MONETARY}) AS monetary_raw,
  COALESCE(r.segment_name, '${NON_BUYER_DEFAULTS.SEGMENT}') AS rfm_segment,
  COALESCE(r.rfm_code, '${NON_BUYER_DEFAULTS.RFM_CODE}') AS rfm_code,
  COALESCE(s.total_sessions, 0) AS total_sessions,
  COALESCE(s.avg_session_duration, 0) AS avg_session_duration,
  COALESCE(s.std_session_duration, 0) AS std_session_duration,
  COALESCE(s.avg_events_per_session, 0) AS avg_events_per_session,
  COALESCE(s.cart_rate, 0) AS cart_rate,
  COALESCE(s.checkout_rate, 0) AS checkout_rate
FROM ${TABLES.DIM_USERS} u
LEFT JOIN ${TABLES.RFM_SEGMENTS} r ON u.user_id = r.user_id
LEFT JOIN session_features s ON u.user_id = s.user_id
ORDER BY u.user_id
`;

export async function buildFeatureStore(db: AnalyticsDatabase): Promise<void> {
  await db.run(FEATURES_USERS_SQL);
}
