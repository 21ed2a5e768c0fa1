import { format, isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { AnalyticsDatabase, AnalyticsError, TABLES } from '@shopper-insights/shared';
import { ClassBalance } from '../types';

const cutoffRow = z.object({ cutoff: z.string().nullable() });
const balanceRow = z.object({ total_rows: z.coerce.number(), positives: z.coerce.number() });

export function normalizeCutoff(value: string): string {
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new AnalyticsError(`Invalid propensity cutoff '${value}'`, 'INVALID_SETTING', 400, { cutoff: value });
  }
  return format(parsed, 'yyyy-MM-dd');
}

/**
 * The configured cutoff, or the first day of the month holding the latest
 * event. Null when the Event Store is empty.
 */
export async function resolveCutoff(db: AnalyticsDatabase, configured?: string): Promise<string | null> {
  if (configured) {
    return normalizeCutoff(configured);
  }
  const row = await db.queryOne(
    `SELECT strftime(date_trunc('month', MAX(event_time)), '%Y-%m-%d') AS cutoff FROM ${TABLES.EVENTS}`,
    cutoffRow
  );
  return row?.cutoff ?? null;
}

// Features come strictly before the cutoff; the target is any purchase at or after it
export function propensityDatasetSql(cutoff: string | null): string {
  const cutoffLiteral = cutoff === null ? 'NULL' : `'${normalizeCutoff(cutoff)}'`;
  return `
CREATE OR REPLACE TABLE ${TABLES.FEATURES_PROPENSITY} AS
WITH params AS (
  SELECT CAST(${cutoffLiteral} AS TIMESTAMP) AS cutoff
),
history AS (
  SELECT
    e.user_id,
    COUNT(*) AS events,
    COUNT(DISTINCT e.session_id) AS sessions,
    COUNT(*) FILTER (WHERE e.event_type = 'view') AS views,
    COUNT(*) FILTER (WHERE e.event_type = 'cart') AS carts,
    COUNT(*) FILTER (WHERE e.event_type = 'remove_from_cart') AS removes,
    MAX(e.event_time) AS last_event,
    date_diff('day', MIN(e.event_time), MAX(e.event_time)) AS active_span_days
  FROM ${TABLES.EVENTS} e
  CROSS JOIN params p
  WHERE e.event_time < p.cutoff
  GROUP BY e.user_id
),
outcome AS (
  SELECT DISTINCT e.user_id
  FROM ${TABLES.EVENTS} e
  CROSS JOIN params p
  WHERE e.event_time >= p.cutoff AND e.event_type = 'purchase'
)
SELECT
  h.user_id,
  h.events,
  h.sessions,
  h.views,
  h.carts,
  h.removes,
  h.active_span_days,
  date_diff('day', h.last_event, p.cutoff) AS recency_days,
  CASE WHEN o.user_id IS NULL THEN 0 ELSE 1 END AS target
FROM history h
CROSS JOIN params p
LEFT JOIN outcome o ON h.user_id = o.user_id
ORDER BY h.user_id
`;
}

export async function buildPropensityDataset(db: AnalyticsDatabase, configuredCutoff?: string): Promise<string | null> {
  const cutoff = await resolveCutoff(db, configuredCutoff);
  await db.run(propensityDatasetSql(cutoff));
  return cutoff;
}

export async function classBalance(db: AnalyticsDatabase): Promise<ClassBalance> {
  const row = await db.queryOne(
    `SELECT COUNT(*) AS total_rows, COUNT(*) FILTER (WHERE target = 1) AS positives FROM ${TABLES.FEATURES_PROPENSITY}`,
    balanceRow
  );
  const rows = row?.total_rows ?? 0;
  const positives = row?.positives ?? 0;
  return { rows, positives, baselineRate: rows === 0 ? null : positives / rows };
}
