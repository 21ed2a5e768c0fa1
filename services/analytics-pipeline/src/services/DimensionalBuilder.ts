import { AnalyticsDatabase, TABLES } from '@shopper-insights/shared';

/**
 * Latest-known attributes per product. The most recent event wins; equal
 * timestamps fall back to the earliest stored row. Ingest sorts on every
 * column, so re-ingesting the same source picks the same row.
 */
export const DIM_PRODUCTS_SQL = `
CREATE OR REPLACE TABLE ${TABLES.DIM_PRODUCTS} AS
SELECT
  product_id,
  category_id,
  COALESCE(category_code, 'unknown') AS category_code,
  COALESCE(brand, 'unknown') AS brand,
  price AS current_price
FROM ${TABLES.EVENTS}
WHERE product_id IS NOT NULL
QUALIFY ROW_NUMBER() OVER (PARTITION BY product_id ORDER BY event_time DESC, rowid ASC) = 1
ORDER BY product_id
`;

export const DIM_USERS_SQL = `
CREATE OR REPLACE TABLE ${TABLES.DIM_USERS} AS
SELECT
  user_id,
  MIN(event_time) AS first_seen,
  MAX(event_time) AS last_seen,
  COUNT(*) AS event_count,
  COUNT(DISTINCT session_id) AS session_count,
  COUNT(*) FILTER (WHERE event_type = 'purchase') AS purchase_count,
  COALESCE(SUM(price) FILTER (WHERE event_type = 'purchase'), 0) AS total_spend,
  COUNT(*) FILTER (WHERE event_type = 'purchase') > 0 AS is_buyer
FROM ${TABLES.EVENTS}
GROUP BY user_id
ORDER BY user_id
`;

export async function buildDimensions(db: AnalyticsDatabase): Promise<void> {
  await db.transaction(async (tx) => {
    await tx.run(DIM_PRODUCTS_SQL);
    await tx.run(DIM_USERS_SQL);
  });
}
