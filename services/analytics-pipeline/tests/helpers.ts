import { z } from 'zod';
import { AnalyticsDatabase, PipelineSettings } from '@shopper-insights/shared';
import { appendEvents } from '../src/services/EventLoader';
import { RawEvent } from '../src/types';

export const openTestDatabase = (): Promise<AnalyticsDatabase> => AnalyticsDatabase.open({ path: ':memory:' });

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    databasePath: ':memory:',
    memoryLimit: '1GB',
    threads: 1,
    rawEventsPath: 'events.csv',
    minSupport: 2,
    minLift: 0,
    quantileCount: 5,
    rfmFrequencyBasis: 'purchase_events',
    minCohortSize: 1,
    churnAtRiskDays: 7,
    churnDays: 14,
    propensityCutoff: undefined,
    ...overrides,
  };
}

export function event(overrides: Partial<RawEvent> & Pick<RawEvent, 'event_time' | 'user_id'>): RawEvent {
  return {
    event_type: 'view',
    product_id: 1,
    category_id: 10,
    category_code: 'electronics.audio',
    brand: 'acme',
    price: 0,
    session_id: `session-${overrides.user_id}`,
    ...overrides,
  };
}

export function purchase(userId: number, eventTime: string, price: number, productId: number = 1, sessionId?: string): RawEvent {
  return event({
    event_time: eventTime,
    user_id: userId,
    event_type: 'purchase',
    price,
    product_id: productId,
    session_id: sessionId ?? `session-${userId}`,
  });
}

export async function seed(db: AnalyticsDatabase, events: readonly RawEvent[]): Promise<void> {
  await appendEvents(db, events);
}

/**
 * Three users: user 1 buys twice ($10 on day 1, $20 on day 5), user 2 once
 * ($100 on day 3), user 3 only browses.
 */
export const THREE_USER_EVENTS: readonly RawEvent[] = [
  purchase(1, '2024-01-01 10:00:00', 10, 100, 'u1-day1'),
  purchase(2, '2024-01-03 10:00:00', 100, 102, 'u2-day3'),
  event({ event_time: '2024-01-04 09:00:00', user_id: 3, product_id: 100, session_id: 'u3-day4' }),
  purchase(1, '2024-01-05 10:00:00', 20, 101, 'u1-day5'),
];

export async function captureError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to reject');
}

export const countSchema = z.object({ n: z.coerce.number() });
