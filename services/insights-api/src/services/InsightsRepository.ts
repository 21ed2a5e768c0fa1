import { z } from 'zod';
import {
  AnalyticsDatabase,
  MissingInputError,
  NOT_AVAILABLE,
  TABLES,
  TableName,
  createServiceLogger,
} from '@shopper-insights/shared';

const logger = createServiceLogger('insights-repository');

export type Metric = number | typeof NOT_AVAILABLE;

/** A table-backed result. `available` is false when the pipeline has not published the table yet. */
export interface Dataset<T> {
  available: boolean;
  data: T[];
}

export interface Overview {
  total_events: Metric;
  total_users: Metric;
  buyers: Metric;
  total_revenue: Metric;
  total_sessions: Metric;
}

export interface FunnelCounts {
  total_sessions: number;
  view_sessions: number;
  cart_sessions: number;
  purchase_sessions: number;
}

export interface FunnelRates {
  view_to_cart: number | null;
  cart_to_purchase: number | null;
  view_to_purchase: number | null;
  /** Sessions with a purchase over all sessions. */
  overall_conversion: number | null;
}

export interface Funnel {
  available: boolean;
  counts: FunnelCounts;
  rates: FunnelRates;
}

export interface DateRange {
  from?: string;
  to?: string;
}

const countRow = z.object({ value: z.coerce.number().nullable() });

const dailyKpiRow = z.object({
  date: z.string(),
  total_events: z.coerce.number(),
  dau: z.coerce.number(),
  daily_sessions: z.coerce.number(),
  total_views: z.coerce.number(),
  total_carts: z.coerce.number(),
  total_removes: z.coerce.number(),
  total_purchases: z.coerce.number(),
  daily_revenue: z.coerce.number(),
});

const funnelRow = z.object({
  total_sessions: z.coerce.number(),
  view_sessions: z.coerce.number(),
  cart_sessions: z.coerce.number(),
  purchase_sessions: z.coerce.number(),
});

const segmentRow = z.object({
  segment_name: z.string(),
  user_count: z.coerce.number(),
  pct_buyers: z.coerce.number(),
  avg_spend: z.coerce.number(),
  avg_recency: z.coerce.number(),
});

const retentionRow = z.object({
  cohort_week: z.string(),
  cohort_size: z.coerce.number(),
  weeks_since_first: z.coerce.number(),
  active_users: z.coerce.number(),
  retention_rate: z.coerce.number(),
  is_low_n: z.boolean(),
});

const churnRow = z.object({
  status: z.string(),
  user_count: z.coerce.number(),
  avg_days_inactive: z.coerce.number(),
});

const affinityRow = z.object({
  product_a: z.coerce.number(),
  product_b: z.coerce.number(),
  category_a: z.string().nullable(),
  brand_a: z.string().nullable(),
  category_b: z.string().nullable(),
  brand_b: z.string().nullable(),
  pair_count: z.coerce.number(),
  confidence: z.coerce.number(),
  lift: z.coerce.number(),
});

const userFeaturesRow = z.object({
  user_id: z.coerce.number(),
  total_spend: z.coerce.number(),
  purchase_count: z.coerce.number(),
  event_count: z.coerce.number(),
  first_seen: z.string(),
  last_seen: z.string(),
  recency_days: z.coerce.number(),
  frequency_raw: z.coerce.number(),
  monetary_raw: z.coerce.number(),
  rfm_segment: z.string(),
  rfm_code: z.string(),
  total_sessions: z.coerce.number(),
  avg_session_duration: z.coerce.number(),
  std_session_duration: z.coerce.number(),
  avg_events_per_session: z.coerce.number(),
  cart_rate: z.coerce.number(),
  checkout_rate: z.coerce.number(),
});

export type DailyKpi = z.infer<typeof dailyKpiRow>;
export type SegmentShare = z.infer<typeof segmentRow>;
export type RetentionCell = z.infer<typeof retentionRow>;
export type ChurnBucket = z.infer<typeof churnRow>;
export type AffinityRule = z.infer<typeof affinityRow>;
export type UserFeatures = z.infer<typeof userFeaturesRow>;

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

/**
 * Step-to-step conversion rates. A step with no sessions yields null rather than a division by zero.
 */
export function computeFunnelRates(counts: FunnelCounts): FunnelRates {
  return {
    view_to_cart: ratio(counts.cart_sessions, counts.view_sessions),
    cart_to_purchase: ratio(counts.purchase_sessions, counts.cart_sessions),
    view_to_purchase: ratio(counts.purchase_sessions, counts.view_sessions),
    overall_conversion: ratio(counts.purchase_sessions, counts.total_sessions),
  };
}

const EMPTY_FUNNEL: FunnelCounts = { total_sessions: 0, view_sessions: 0, cart_sessions: 0, purchase_sessions: 0 };

/**
 * Read-only queries behind the dashboard. Every method tolerates tables the
 * pipeline has not written yet.
 */
export class InsightsRepository {
  constructor(private readonly db: AnalyticsDatabase) {}

  async getOverview(): Promise<Overview> {
    return {
      total_events: await this.metric(TABLES.EVENTS, `SELECT COUNT(*) AS value FROM ${TABLES.EVENTS}`),
      total_users: await this.metric(TABLES.DIM_USERS, `SELECT COUNT(*) AS value FROM ${TABLES.DIM_USERS}`),
      buyers: await this.metric(TABLES.DIM_USERS, `SELECT COUNT(*) FILTER (WHERE is_buyer) AS value FROM ${TABLES.DIM_USERS}`),
      total_revenue: await this.metric(
        TABLES.DIM_USERS,
        `SELECT ROUND(COALESCE(SUM(total_spend), 0), 2) AS value FROM ${TABLES.DIM_USERS}`
      ),
      total_sessions: await this.metric(TABLES.FACT_SESSIONS, `SELECT COUNT(*) AS value FROM ${TABLES.FACT_SESSIONS}`),
    };
  }

  async getDailyKpis(range: DateRange = {}): Promise<Dataset<DailyKpi>> {
    const conditions: string[] = [];
    const params: string[] = [];
    if (range.from) {
      params.push(range.from);
      conditions.push(`date >= CAST($${params.length} AS DATE)`);
    }
    if (range.to) {
      params.push(range.to);
      conditions.push(`date <= CAST($${params.length} AS DATE)`);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    return this.dataset(TABLES.FACT_DAILY_KPIS, () =>
      this.db.query(
        `
        SELECT
          strftime(date, '%Y-%m-%d') AS date,
          total_events, dau, daily_sessions, total_views, total_carts,
          total_removes, total_purchases, daily_revenue
        FROM ${TABLES.FACT_DAILY_KPIS}
        ${where}
        ORDER BY date
        `,
        dailyKpiRow,
        params
      )
    );
  }

  async getFunnel(): Promise<Funnel> {
    if (!(await this.db.tableExists(TABLES.FACT_SESSIONS))) {
      return { available: false, counts: EMPTY_FUNNEL, rates: computeFunnelRates(EMPTY_FUNNEL) };
    }
    const row = await this.db.queryOne(
      `
      SELECT
        COUNT(*) AS total_sessions,
        COUNT(*) FILTER (WHERE has_view) AS view_sessions,
        COUNT(*) FILTER (WHERE has_cart) AS cart_sessions,
        COUNT(*) FILTER (WHERE has_purchase) AS purchase_sessions
      FROM ${TABLES.FACT_SESSIONS}
      `,
      funnelRow
    );
    const counts = row ?? EMPTY_FUNNEL;
    return { available: true, counts, rates: computeFunnelRates(counts) };
  }

  async getSegments(): Promise<Dataset<SegmentShare>> {
    return this.dataset(TABLES.RFM_SEGMENTS, () =>
      this.db.query(
        `
        SELECT
          segment_name,
          COUNT(*) AS user_count,
          ROUND(100 * CAST(COUNT(*) AS DOUBLE) / SUM(COUNT(*)) OVER (), 1) AS pct_buyers,
          ROUND(AVG(monetary), 2) AS avg_spend,
          ROUND(AVG(recency_days), 1) AS avg_recency
        FROM ${TABLES.RFM_SEGMENTS}
        GROUP BY segment_name
        ORDER BY avg_spend DESC, segment_name
        `,
        segmentRow
      )
    );
  }

  async getRetention(maxWeeks?: number): Promise<Dataset<RetentionCell>> {
    return this.dataset(TABLES.WEEKLY_RETENTION, () =>
      this.db.query(
        `
        SELECT
          strftime(cohort_week, '%Y-%m-%d') AS cohort_week,
          cohort_size, weeks_since_first, active_users, retention_rate, is_low_n
        FROM ${TABLES.WEEKLY_RETENTION}
        ${maxWeeks === undefined ? '' : `WHERE weeks_since_first <= ${Math.floor(maxWeeks)}`}
        ORDER BY cohort_week, weeks_since_first
        `,
        retentionRow
      )
    );
  }

  async getChurn(): Promise<Dataset<ChurnBucket>> {
    return this.dataset(TABLES.CHURN_RISK, () =>
      this.db.query(
        `
        SELECT
          status,
          COUNT(*) AS user_count,
          ROUND(AVG(days_inactive), 1) AS avg_days_inactive
        FROM ${TABLES.CHURN_RISK}
        GROUP BY status
        ORDER BY avg_days_inactive
        `,
        churnRow
      )
    );
  }

  async getAffinity(limit: number): Promise<Dataset<AffinityRule>> {
    // Rules are served without product metadata until dim_products is published
    const hasProducts = await this.db.tableExists(TABLES.DIM_PRODUCTS);
    const metadata = hasProducts
      ? `pa.category_code AS category_a, pa.brand AS brand_a, pb.category_code AS category_b, pb.brand AS brand_b`
      : `CAST(NULL AS VARCHAR) AS category_a, CAST(NULL AS VARCHAR) AS brand_a,
         CAST(NULL AS VARCHAR) AS category_b, CAST(NULL AS VARCHAR) AS brand_b`;
    const joins = hasProducts
      ? `LEFT JOIN ${TABLES.DIM_PRODUCTS} pa ON r.product_a = pa.product_id
         LEFT JOIN ${TABLES.DIM_PRODUCTS} pb ON r.product_b = pb.product_id`
      : '';

    return this.dataset(TABLES.PRODUCT_AFFINITY, () =>
      this.db.query(
        `
        SELECT
          r.product_a,
          r.product_b,
          ${metadata},
          r.pair_count,
          r.confidence,
          r.lift
        FROM ${TABLES.PRODUCT_AFFINITY} r
        ${joins}
        ORDER BY r.lift DESC, r.product_a, r.product_b
        LIMIT ${Math.max(0, Math.floor(limit))}
        `,
        affinityRow
      )
    );
  }

  async getUserFeatures(userId: number | bigint): Promise<UserFeatures> {
    if (!(await this.db.tableExists(TABLES.FEATURES_USERS))) {
      throw new MissingInputError(TABLES.FEATURES_USERS, 'The feature store has not been built yet');
    }
    const row = await this.db.queryOne(
      `
      SELECT
        * REPLACE (
          strftime(first_seen, '%Y-%m-%d %H:%M:%S') AS first_seen,
          strftime(last_seen, '%Y-%m-%d %H:%M:%S') AS last_seen
        )
      FROM ${TABLES.FEATURES_USERS}
      WHERE user_id = CAST($1 AS BIGINT)
      `,
      userFeaturesRow,
      [BigInt(userId)]
    );
    if (!row) {
      throw new MissingInputError(`user:${userId}`, `No features for user ${userId}`, { userId: String(userId) });
    }
    return row;
  }

  private async metric(table: TableName, sql: string): Promise<Metric> {
    if (!(await this.db.tableExists(table))) {
      logger.debug('Table not published, reporting N/A', { table });
      return NOT_AVAILABLE;
    }
    const row = await this.db.queryOne(sql, countRow);
    return row?.value ?? 0;
  }

  private async dataset<T>(table: TableName, load: () => Promise<T[]>): Promise<Dataset<T>> {
    if (!(await this.db.tableExists(table))) {
      logger.debug('Table not published, returning empty dataset', { table });
      return { available: false, data: [] };
    }
    return { available: true, data: await load() };
  }
}
