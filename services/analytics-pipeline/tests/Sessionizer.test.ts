import { expect } from 'chai';
import { z } from 'zod';
import { AnalyticsDatabase, TABLES } from '@shopper-insights/shared';
import { buildSessions } from '../src/services/Sessionizer';
import { event, openTestDatabase, purchase, seed } from './helpers';

const sessionRow = z.object({
  session_id: z.string(),
  user_id: z.coerce.number(),
  session_start: z.string(),
  duration_sec: z.coerce.number(),
  event_count: z.coerce.number(),
  unique_products: z.coerce.number(),
  has_view: z.boolean(),
  has_cart: z.boolean(),
  has_remove: z.boolean(),
  has_purchase: z.boolean(),
  session_revenue: z.number(),
});

const readSessions = (db: AnalyticsDatabase) =>
  db.query(
    `SELECT
       session_id, user_id, strftime(session_start, '%Y-%m-%d %H:%M:%S') AS session_start,
       duration_sec, event_count, unique_products,
       has_view, has_cart, has_remove, has_purchase, session_revenue
     FROM ${TABLES.FACT_SESSIONS}
     ORDER BY session_id`,
    sessionRow
  );

describe('Sessionizer', () => {
  let db: AnalyticsDatabase;

  beforeEach(async () => {
    db = await openTestDatabase();
  });

  afterEach(async () => {
    await db.close();
  });

  it('should roll a visit up into one row with funnel flags and revenue', async () => {
    await seed(db, [
      event({ event_time: '2024-02-01 10:00:00', user_id: 7, session_id: 'x', product_id: 1 }),
      event({ event_time: '2024-02-01 10:02:00', user_id: 7, session_id: 'x', product_id: 2 }),
      event({ event_time: '2024-02-01 10:05:00', user_id: 7, session_id: 'x', product_id: 1, event_type: 'cart', price: 40 }),
      purchase(7, '2024-02-01 10:10:30', 40, 1, 'x'),
    ]);

    await buildSessions(db);

    expect(await readSessions(db)).to.deep.equal([
      {
        session_id: 'x',
        user_id: 7,
        session_start: '2024-02-01 10:00:00',
        duration_sec: 630,
        event_count: 4,
        unique_products: 2,
        has_view: true,
        has_cart: true,
        has_remove: false,
        has_purchase: true,
        session_revenue: 40,
      },
    ]);
  });

  it('should leave out events without a session id', async () => {
    await seed(db, [
      event({ event_time: '2024-02-01 10:00:00', user_id: 7, session_id: 'x' }),
      event({ event_time: '2024-02-01 11:00:00', user_id: 7, session_id: null }),
      event({ event_time: '2024-02-01 12:00:00', user_id: 8, session_id: null, event_type: 'purchase', price: 15 }),
    ]);

    await buildSessions(db);

    const sessions = await readSessions(db);
    expect(sessions.map((session) => session.session_id)).to.deep.equal(['x']);
    expect(sessions[0].event_count).to.equal(1);
  });

  it('should attribute a session seen under several users to the smallest user id', async () => {
    await seed(db, [
      event({ event_time: '2024-02-01 10:00:00', user_id: 9, session_id: 'shared' }),
      event({ event_time: '2024-02-01 10:01:00', user_id: 8, session_id: 'shared' }),
    ]);

    await buildSessions(db);

    const [session] = await readSessions(db);
    expect(session.user_id).to.equal(8);
    expect(session.duration_sec).to.equal(60);
  });
});
