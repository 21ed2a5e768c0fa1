import { expect } from 'chai';
import { AnalyticsDatabase, MissingInputError, TABLES } from '@shopper-insights/shared';
import { InsightsRepository, computeFunnelRates } from '../src/services/InsightsRepository';

async function captureError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to reject');
}

describe('InsightsRepository', () => {
  let db: AnalyticsDatabase;
  let repository: InsightsRepository;

  beforeEach(async () => {
    db = await AnalyticsDatabase.open({ path: ':memory:' });
    repository = new InsightsRepository(db);
  });

  afterEach(async () => {
    await db.close();
  });

  describe('computeFunnelRates', () => {
    it('should divide each step by the one before it', () => {
      expect(
        computeFunnelRates({ total_sessions: 10, view_sessions: 8, cart_sessions: 4, purchase_sessions: 1 })
      ).to.deep.equal({ view_to_cart: 0.5, cart_to_purchase: 0.25, view_to_purchase: 0.125, overall_conversion: 0.1 });
    });

    it('should return null for a step without sessions', () => {
      expect(
        computeFunnelRates({ total_sessions: 3, view_sessions: 3, cart_sessions: 0, purchase_sessions: 0 })
      ).to.deep.equal({ view_to_cart: 0, cart_to_purchase: null, view_to_purchase: 0, overall_conversion: 0 });
    });

    it('should measure overall conversion against every session, not only viewing ones', () => {
      const rates = computeFunnelRates({ total_sessions: 10, view_sessions: 4, cart_sessions: 2, purchase_sessions: 1 });

      expect(rates.view_to_purchase).to.equal(0.25);
      expect(rates.overall_conversion).to.equal(0.1);
    });

    it('should return null for every rate when there are no sessions', () => {
      expect(
        computeFunnelRates({ total_sessions: 0, view_sessions: 0, cart_sessions: 0, purchase_sessions: 0 })
      ).to.deep.equal({ view_to_cart: null, cart_to_purchase: null, view_to_purchase: null, overall_conversion: null });
    });
  });

  describe('before the pipeline has run', () => {
    it('should report every headline metric as N/A', async () => {
      expect(await repository.getOverview()).to.deep.equal({
        total_events: 'N/A',
        total_users: 'N/A',
        buyers: 'N/A',
        total_revenue: 'N/A',
        total_sessions: 'N/A',
      });
    });

    it('should return unavailable datasets', async () => {
      const unavailable = { available: false, data: [] };

      expect(await repository.getDailyKpis()).to.deep.equal(unavailable);
      expect(await repository.getSegments()).to.deep.equal(unavailable);
      expect(await repository.getRetention()).to.deep.equal(unavailable);
      expect(await repository.getChurn()).to.deep.equal(unavailable);
      expect(await repository.getAffinity(10)).to.deep.equal(unavailable);
    });

    it('should return an empty funnel without rates', async () => {
      expect(await repository.getFunnel()).to.deep.equal({
        available: false,
        counts: { total_sessions: 0, view_sessions: 0, cart_sessions: 0, purchase_sessions: 0 },
        rates: { view_to_cart: null, cart_to_purchase: null, view_to_purchase: null, overall_conversion: null },
      });
    });

    it('should refuse feature lookups', async () => {
      const error = await captureError(() => repository.getUserFeatures(1));

      expect(error).to.be.instanceOf(MissingInputError);
      if (error instanceof MissingInputError) {
        expect(error.input).to.equal(TABLES.FEATURES_USERS);
        expect(error.statusCode).to.equal(404);
      }
    });
  });

  describe('with published tables', () => {
    beforeEach(async () => {
      await db.run(`CREATE TABLE ${TABLES.EVENTS} AS SELECT * FROM range(7) t(n)`);
      await db.run(`
        CREATE TABLE ${TABLES.DIM_USERS} (user_id BIGINT, is_buyer BOOLEAN, total_spend DOUBLE);
        INSERT INTO ${TABLES.DIM_USERS} VALUES (1, true, 30.125), (2, true, 100.0), (3, false, 0.0);
      `);
      await db.run(`
        CREATE TABLE ${TABLES.FACT_SESSIONS} (session_id VARCHAR, has_view BOOLEAN, has_cart BOOLEAN, has_purchase BOOLEAN);
        INSERT INTO ${TABLES.FACT_SESSIONS} VALUES
          ('s1', true, false, false),
          ('s2', true, true, false),
          ('s3', true, true, true),
          ('s4', false, false, false);
      `);
    });

    it('should total events, users, buyers, revenue and sessions', async () => {
      expect(await repository.getOverview()).to.deep.equal({
        total_events: 7,
        total_users: 3,
        buyers: 2,
        total_revenue: 130.13,
        total_sessions: 4,
      });
    });

    it('should count sessions reaching each funnel step', async () => {
      const funnel = await repository.getFunnel();

      expect(funnel.available).to.equal(true);
      expect(funnel.counts).to.deep.equal({ total_sessions: 4, view_sessions: 3, cart_sessions: 2, purchase_sessions: 1 });
      expect(funnel.rates.view_to_cart).to.be.closeTo(2 / 3, 1e-12);
      expect(funnel.rates.cart_to_purchase).to.equal(0.5);
      expect(funnel.rates.view_to_purchase).to.be.closeTo(1 / 3, 1e-12);
      expect(funnel.rates.overall_conversion).to.equal(0.25);
    });

    it('should filter daily KPIs by an inclusive date range', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.FACT_DAILY_KPIS} (
          date DATE, total_events BIGINT, dau BIGINT, daily_sessions BIGINT, total_views BIGINT,
          total_carts BIGINT, total_removes BIGINT, total_purchases BIGINT, daily_revenue DOUBLE
        );
        INSERT INTO ${TABLES.FACT_DAILY_KPIS} VALUES
          ('2024-01-01', 10, 3, 4, 8, 1, 0, 1, 25.5),
          ('2024-01-02', 6, 2, 2, 5, 1, 0, 0, 0),
          ('2024-01-03', 4, 1, 1, 2, 1, 0, 1, 12.0);
      `);

      const all = await repository.getDailyKpis();
      expect(all.data.map((row) => row.date)).to.deep.equal(['2024-01-01', '2024-01-02', '2024-01-03']);

      const fromSecond = await repository.getDailyKpis({ from: '2024-01-02' });
      expect(fromSecond.data.map((row) => row.date)).to.deep.equal(['2024-01-02', '2024-01-03']);

      const single = await repository.getDailyKpis({ from: '2024-01-02', to: '2024-01-02' });
      expect(single).to.deep.equal({
        available: true,
        data: [
          {
            date: '2024-01-02',
            total_events: 6,
            dau: 2,
            daily_sessions: 2,
            total_views: 5,
            total_carts: 1,
            total_removes: 0,
            total_purchases: 0,
            daily_revenue: 0,
          },
        ],
      });
    });

    it('should summarise segments by share of buyers', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.RFM_SEGMENTS} (user_id BIGINT, segment_name VARCHAR, monetary DOUBLE, recency_days INTEGER);
        INSERT INTO ${TABLES.RFM_SEGMENTS} VALUES
          (1, 'Champions', 100.0, 1),
          (2, 'Champions', 80.0, 3),
          (3, 'Hibernating', 10.0, 20);
      `);

      expect(await repository.getSegments()).to.deep.equal({
        available: true,
        data: [
          { segment_name: 'Champions', user_count: 2, pct_buyers: 66.7, avg_spend: 90, avg_recency: 2 },
          { segment_name: 'Hibernating', user_count: 1, pct_buyers: 33.3, avg_spend: 10, avg_recency: 20 },
        ],
      });
    });

    it('should cap the retention matrix at the requested week', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.WEEKLY_RETENTION} (
          cohort_week DATE, cohort_size BIGINT, weeks_since_first BIGINT,
          active_users BIGINT, retention_rate DOUBLE, is_low_n BOOLEAN
        );
        INSERT INTO ${TABLES.WEEKLY_RETENTION} VALUES
          ('2024-01-01', 4, 0, 4, 1.0, false),
          ('2024-01-01', 4, 1, 2, 0.5, false),
          ('2024-01-01', 4, 2, 1, 0.25, false);
      `);

      const result = await repository.getRetention(1);

      expect(result.data).to.deep.equal([
        { cohort_week: '2024-01-01', cohort_size: 4, weeks_since_first: 0, active_users: 4, retention_rate: 1, is_low_n: false },
        { cohort_week: '2024-01-01', cohort_size: 4, weeks_since_first: 1, active_users: 2, retention_rate: 0.5, is_low_n: false },
      ]);
    });

    it('should count users per churn status', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.CHURN_RISK} (user_id BIGINT, days_inactive INTEGER, status VARCHAR);
        INSERT INTO ${TABLES.CHURN_RISK} VALUES (1, 0, 'Active'), (2, 4, 'Active'), (3, 20, 'Churned');
      `);

      expect((await repository.getChurn()).data).to.deep.equal([
        { status: 'Active', user_count: 2, avg_days_inactive: 2 },
        { status: 'Churned', user_count: 1, avg_days_inactive: 20 },
      ]);
    });

    it('should join affinity rules to product attributes', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.DIM_PRODUCTS} (product_id BIGINT, category_code VARCHAR, brand VARCHAR);
        INSERT INTO ${TABLES.DIM_PRODUCTS} VALUES (1, 'electronics.audio', 'acme'), (2, 'electronics.video', 'globex');
        CREATE TABLE ${TABLES.PRODUCT_AFFINITY} (
          product_a BIGINT, product_b BIGINT, pair_count BIGINT, confidence DOUBLE, lift DOUBLE
        );
        INSERT INTO ${TABLES.PRODUCT_AFFINITY} VALUES (1, 2, 3, 0.5, 2.0), (1, 3, 2, 0.4, 1.5), (2, 9, 2, 0.25, 3.0);
      `);

      const result = await repository.getAffinity(2);

      expect(result).to.deep.equal({
        available: true,
        data: [
          {
            product_a: 2,
            product_b: 9,
            category_a: 'electronics.video',
            brand_a: 'globex',
            category_b: null,
            brand_b: null,
            pair_count: 2,
            confidence: 0.25,
            lift: 3,
          },
          {
            product_a: 1,
            product_b: 2,
            category_a: 'electronics.audio',
            brand_a: 'acme',
            category_b: 'electronics.video',
            brand_b: 'globex',
            pair_count: 3,
            confidence: 0.5,
            lift: 2,
          },
        ],
      });
    });

    it('should serve affinity rules before product metadata is published', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.PRODUCT_AFFINITY} (
          product_a BIGINT, product_b BIGINT, pair_count BIGINT, confidence DOUBLE, lift DOUBLE
        );
        INSERT INTO ${TABLES.PRODUCT_AFFINITY} VALUES (1, 2, 3, 0.5, 2.0);
      `);

      expect(await repository.getAffinity(10)).to.deep.equal({
        available: true,
        data: [
          {
            product_a: 1,
            product_b: 2,
            category_a: null,
            brand_a: null,
            category_b: null,
            brand_b: null,
            pair_count: 3,
            confidence: 0.5,
            lift: 2,
          },
        ],
      });
    });

    it('should look up one user in the feature store', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.FEATURES_USERS} AS
        SELECT
          CAST(5 AS BIGINT) AS user_id,
          CAST(42.5 AS DOUBLE) AS total_spend,
          CAST(2 AS BIGINT) AS purchase_count,
          CAST(9 AS BIGINT) AS event_count,
          TIMESTAMP '2024-01-01 10:00:00' AS first_seen,
          TIMESTAMP '2024-01-05 18:30:00' AS last_seen,
          3 AS recency_days,
          CAST(2 AS BIGINT) AS frequency_raw,
          CAST(42.5 AS DOUBLE) AS monetary_raw,
          'Loyal Customers' AS rfm_segment,
          '343' AS rfm_code,
          CAST(3 AS BIGINT) AS total_sessions,
          CAST(120.0 AS DOUBLE) AS avg_session_duration,
          CAST(10.0 AS DOUBLE) AS std_session_duration,
          CAST(3.0 AS DOUBLE) AS avg_events_per_session,
          CAST(0.5 AS DOUBLE) AS cart_rate,
          CAST(1.0 AS DOUBLE) AS checkout_rate
      `);

      expect(await repository.getUserFeatures(5)).to.deep.equal({
        user_id: 5,
        total_spend: 42.5,
        purchase_count: 2,
        event_count: 9,
        first_seen: '2024-01-01 10:00:00',
        last_seen: '2024-01-05 18:30:00',
        recency_days: 3,
        frequency_raw: 2,
        monetary_raw: 42.5,
        rfm_segment: 'Loyal Customers',
        rfm_code: '343',
        total_sessions: 3,
        avg_session_duration: 120,
        std_session_duration: 10,
        avg_events_per_session: 3,
        cart_rate: 0.5,
        checkout_rate: 1,
      });

      const error = await captureError(() => repository.getUserFeatures(6));
      expect(error).to.be.instanceOf(MissingInputError);
      if (error instanceof MissingInputError) {
        expect(error.input).to.equal('user:6');
        expect(error.message).to.equal('No features for user 6');
      }
    });

    it('should find users whose ids exceed the 32-bit range', async () => {
      await db.run(`
        CREATE TABLE ${TABLES.FEATURES_USERS} AS
        SELECT
          user_id,
          CAST(0 AS DOUBLE) AS total_spend,
          CAST(0 AS BIGINT) AS purchase_count,
          CAST(1 AS BIGINT) AS event_count,
          TIMESTAMP '2024-01-01 10:00:00' AS first_seen,
          TIMESTAMP '2024-01-01 10:00:00' AS last_seen,
          -1 AS recency_days,
          CAST(0 AS BIGINT) AS frequency_raw,
          CAST(0 AS DOUBLE) AS monetary_raw,
          'Browser' AS rfm_segment,
          '000' AS rfm_code,
          CAST(1 AS BIGINT) AS total_sessions,
          CAST(0 AS DOUBLE) AS avg_session_duration,
          CAST(0 AS DOUBLE) AS std_session_duration,
          CAST(1 AS DOUBLE) AS avg_events_per_session,
          CAST(0 AS DOUBLE) AS cart_rate,
          CAST(0 AS DOUBLE) AS checkout_rate
        FROM (VALUES (CAST(3000000001 AS BIGINT)), (CAST(2053013555631882655 AS BIGINT))) ids(user_id)
      `);

      expect((await repository.getUserFeatures(3000000001)).user_id).to.equal(3000000001);
      expect((await repository.getUserFeatures(2053013555631882655n)).rfm_segment).to.equal('Browser');

      const error = await captureError(() => repository.getUserFeatures(2053013555631882654n));
      expect(error).to.be.instanceOf(MissingInputError);
    });
  });
});
