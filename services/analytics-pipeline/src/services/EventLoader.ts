import { promises as fs } from 'fs';
import { z } from 'zod';
import {
  AnalyticsDatabase,
  AnalyticsError,
  EVENT_TYPES,
  InvalidEventError,
  MissingInputError,
  TABLES,
  createServiceLogger,
  describeError,
} from '@shopper-insights/shared';
import { LoadOptions, RawEvent, SourceFormat } from '../types';

const logger = createServiceLogger('event-loader');

export const EVENTS_DDL = `
CREATE TABLE IF NOT EXISTS ${TABLES.EVENTS} (
  event_time TIMESTAMP NOT NULL,
  event_type VARCHAR NOT NULL,
  product_id BIGINT,
  category_id BIGINT,
  category_code VARCHAR,
  brand VARCHAR,
  price DOUBLE,
  user_id BIGINT NOT NULL,
  session_id VARCHAR
)`;

const INSERT_EVENT_SQL = `
INSERT INTO ${TABLES.EVENTS} VALUES (
  CAST($1 AS TIMESTAMP), $2, CAST($3 AS BIGINT), CAST($4 AS BIGINT),
  $5, $6, CAST($7 AS DOUBLE), CAST($8 AS BIGINT), $9
)`;

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2}(?:\.\d+)?)(?: UTC|Z)?$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

// Bound as bigint: plain numbers would be bound as 32-bit integers
const entityId = z
  .union([z.number().int().safe(), z.bigint(), z.string().regex(/^-?\d+$/)])
  .transform((value) => BigInt(value))
  .refine((value) => value >= INT64_MIN && value <= INT64_MAX, 'outside the BIGINT range');

const rawEventSchema = z.object({
  event_time: z.string().regex(TIMESTAMP_PATTERN, 'expected YYYY-MM-DD HH:mm:ss'),
  event_type: z.nativeEnum(EVENT_TYPES),
  product_id: entityId,
  category_id: entityId,
  category_code: z.string().nullish(),
  brand: z.string().nullish(),
  price: z.number().finite().nonnegative(),
  user_id: entityId,
  session_id: z.string().min(1).nullish(),
});

// Columns every source file must provide; the session column may use either name
const REQUIRED_SOURCE_COLUMNS = ['event_time', 'event_type', 'product_id', 'category_id', 'price', 'user_id'] as const;
const OPTIONAL_SOURCE_COLUMNS = ['category_code', 'brand'] as const;
const SESSION_COLUMNS = ['session_id', 'user_session'] as const;

// Total order over every column: equal timestamps land in the same row order on every ingest
const INGEST_ORDER = [
  'event_time',
  'product_id',
  'user_id',
  'event_type',
  'price',
  'session_id',
  'category_id',
  'category_code',
  'brand',
] as const;

const describeRow = z.object({
  column_name: z.string(),
  column_type: z.string(),
});

export function normalizeTimestamp(value: string): string {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new InvalidEventError([`event_time: unparseable timestamp '${value}'`]);
  }
  return `${match[1]} ${match[2]}`;
}

export function inferFormat(source: string): SourceFormat {
  const lower = source.toLowerCase();
  if (lower.endsWith('.parquet')) return 'parquet';
  if (lower.endsWith('.csv') || lower.endsWith('.csv.gz')) return 'csv';
  throw new AnalyticsError(`Cannot infer the format of '${source}'; pass --format`, 'UNKNOWN_FORMAT', 400, { source });
}

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function isGlob(source: string): boolean {
  return /[*?[]/.test(source);
}

function readerExpression(source: string, format: SourceFormat): string {
  return format === 'parquet'
    ? `read_parquet(${sqlString(source)})`
    : `read_csv(${sqlString(source)}, header = true, all_varchar = true)`;
}

export async function createEventStore(db: AnalyticsDatabase): Promise<void> {
  await db.run(EVENTS_DDL);
}

/**
 * Validates a batch and inserts it in one transaction. An invalid event rejects the whole batch.
 */
export async function appendEvents(db: AnalyticsDatabase, events: readonly RawEvent[]): Promise<number> {
  const issues: string[] = [];
  const rows = events.flatMap((event, index) => {
    const parsed = rawEventSchema.safeParse(event);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((issue) => `[${index}] ${issue.path.join('.')}: ${issue.message}`));
      return [];
    }
    return [parsed.data];
  });

  if (issues.length > 0) {
    throw new InvalidEventError(issues, { batchSize: events.length });
  }

  await createEventStore(db);
  await db.transaction(async (tx) => {
    for (const row of rows) {
      await tx.run(INSERT_EVENT_SQL, [
        normalizeTimestamp(row.event_time),
        row.event_type,
        row.product_id,
        row.category_id,
        row.category_code ?? null,
        row.brand ?? null,
        row.price,
        row.user_id,
        row.session_id ?? null,
      ]);
    }
  });

  logger.debug('Appended events', { count: rows.length });
  return rows.length;
}

async function assertSourceExists(source: string): Promise<void> {
  if (isGlob(source)) {
    return;
  }
  try {
    await fs.access(source);
  } catch {
    throw new MissingInputError(source, `Raw event source not found at ${source}`);
  }
}

function timestampExpression(columnType: string): string {
  return columnType.toUpperCase().startsWith('TIMESTAMP')
    ? 'CAST(event_time AS TIMESTAMP)'
    : `CAST(regexp_replace(CAST(event_time AS VARCHAR), ' UTC$', '') AS TIMESTAMP)`;
}

/**
 * Replaces the Event Store with the contents of a CSV or Parquet source, ordered by event_time
 * and then by every other column.
 */
export async function loadEvents(db: AnalyticsDatabase, options: LoadOptions): Promise<number> {
  const format = options.format ?? inferFormat(options.source);
  await assertSourceExists(options.source);

  const reader = readerExpression(options.source, format);

  let columns: z.infer<typeof describeRow>[];
  try {
    columns = await db.query(`DESCRIBE SELECT * FROM ${reader}`, describeRow);
  } catch (error) {
    if (/no files found/i.test(describeError(error))) {
      throw new MissingInputError(options.source, `Raw event source not found at ${options.source}`);
    }
    throw error;
  }

  const types = new Map(columns.map((column) => [column.column_name, column.column_type]));
  const missing = REQUIRED_SOURCE_COLUMNS.filter((column) => !types.has(column));
  const sessionColumn = SESSION_COLUMNS.find((column) => types.has(column));
  if (missing.length > 0) {
    throw new AnalyticsError(`Source ${options.source} is missing columns: ${missing.join(', ')}`, 'INVALID_SOURCE', 400, {
      source: options.source,
      missing,
    });
  }

  const optional = OPTIONAL_SOURCE_COLUMNS.map((column) =>
    types.has(column) ? `CAST(${column} AS VARCHAR) AS ${column}` : `CAST(NULL AS VARCHAR) AS ${column}`
  );

  logger.info('Ingesting raw events', { source: options.source, format, sessionColumn: sessionColumn ?? 'none' });

  await db.run(`
    CREATE OR REPLACE TABLE ${TABLES.EVENTS} AS
    SELECT
      ${timestampExpression(types.get('event_time') ?? 'VARCHAR')} AS event_time,
      CAST(event_type AS VARCHAR) AS event_type,
      CAST(product_id AS BIGINT) AS product_id,
      CAST(category_id AS BIGINT) AS category_id,
      ${optional.join(',\n      ')},
      CAST(price AS DOUBLE) AS price,
      CAST(user_id AS BIGINT) AS user_id,
      ${sessionColumn ? `NULLIF(CAST(${sessionColumn} AS VARCHAR), '')` : 'CAST(NULL AS VARCHAR)'} AS session_id
    FROM ${reader}
    ORDER BY ${INGEST_ORDER.join(', ')}
  `);

  const rowCount = await db.rowCount(TABLES.EVENTS);
  logger.info('Ingestion complete', { rows: rowCount });
  return rowCount;
}
