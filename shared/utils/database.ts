import { DuckDBConnection, DuckDBInstance, DuckDBValue } from '@duckdb/node-api';
import { z } from 'zod';
import logger from './logger';
import { AnalyticsError, ResourceLimitError, describeError, isOutOfMemory } from './errors';
import { isValidMemoryLimit } from './config';

export type QueryParams = DuckDBValue[];

export interface ResourceLimits {
  memoryLimit: string;
  threads: number;
}

export interface DatabaseOptions extends Partial<ResourceLimits> {
  /** Database file, or `:memory:` for a throwaway database. */
  path: string;
  readOnly?: boolean;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const countRow = z.object({ n: z.coerce.number() });

export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new AnalyticsError(`Invalid identifier '${name}'`, 'INVALID_IDENTIFIER', 400, { name });
  }
  return `"${name}"`;
}

/**
 * One session against the embedded analytical database. Opened explicitly
 * before a pipeline run (or at API start-up) and closed afterwards.
 */
export class AnalyticsDatabase {
  private closed = false;
  private inTransaction = false;

  private constructor(
    private readonly instance: DuckDBInstance,
    private readonly connection: DuckDBConnection,
    public readonly path: string,
    public readonly readOnly: boolean
  ) {}

  public static async open(options: DatabaseOptions): Promise<AnalyticsDatabase> {
    const settings: Record<string, string> = {};
    if (options.readOnly) {
      settings.access_mode = 'READ_ONLY';
    }
    if (options.memoryLimit) {
      assertMemoryLimit(options.memoryLimit);
      settings.memory_limit = options.memoryLimit;
    }
    if (options.threads !== undefined) {
      assertThreads(options.threads);
      settings.threads = String(options.threads);
    }

    const instance = await DuckDBInstance.create(options.path, settings);
    const connection = await instance.connect();

    logger.debug('Database session opened', {
      path: options.path,
      readOnly: Boolean(options.readOnly),
    });

    return new AnalyticsDatabase(instance, connection, options.path, Boolean(options.readOnly));
  }

  public get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Sets the engine's memory ceiling and thread count for the statements that follow.
   */
  public async applyResourceLimits(limits: ResourceLimits): Promise<void> {
    assertMemoryLimit(limits.memoryLimit);
    assertThreads(limits.threads);
    await this.run(`SET memory_limit = '${limits.memoryLimit}'`);
    await this.run(`SET threads = ${limits.threads}`);
  }

  public async run(sql: string, params?: QueryParams): Promise<void> {
    await this.execute(sql, params, async () => {
      await this.connection.run(sql, params);
      return undefined;
    });
  }

  /**
   * Runs a query and validates every row against `schema`.
   */
  public async query<S extends z.ZodTypeAny>(sql: string, schema: S, params?: QueryParams): Promise<z.infer<S>[]> {
    const rows = await this.execute(sql, params, async () => {
      const reader = await this.connection.runAndReadAll(sql, params);
      return reader.getRowObjects();
    });
    return z.array(schema).parse(rows);
  }

  public async queryOne<S extends z.ZodTypeAny>(sql: string, schema: S, params?: QueryParams): Promise<z.infer<S> | undefined> {
    const rows = await this.query(sql, schema, params);
    return rows[0];
  }

  public async tableExists(table: string): Promise<boolean> {
    const row = await this.queryOne(
      'SELECT COUNT(*) AS n FROM information_schema.tables WHERE table_name = $1',
      countRow,
      [table]
    );
    return (row?.n ?? 0) > 0;
  }

  public async rowCount(table: string): Promise<number> {
    const row = await this.queryOne(`SELECT COUNT(*) AS n FROM ${quoteIdentifier(table)}`, countRow);
    return row?.n ?? 0;
  }

  public async transaction<T>(callback: (db: AnalyticsDatabase) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return callback(this);
    }

    await this.run('BEGIN TRANSACTION');
    this.inTransaction = true;
    try {
      const result = await callback(this);
      await this.run('COMMIT');
      return result;
    } catch (error) {
      await this.run('ROLLBACK');
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const row = await this.queryOne('SELECT 1 AS n', countRow);
      return row?.n === 1;
    } catch (error) {
      logger.error('Database health check failed', { error: describeError(error) });
      return false;
    }
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.connection.closeSync();
    this.instance.closeSync();
    logger.debug('Database session closed', { path: this.path });
  }

  private async execute<T>(sql: string, params: QueryParams | undefined, fn: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new AnalyticsError('Database session is closed', 'DATABASE_CLOSED', 500, { path: this.path });
    }

    const start = Date.now();
    try {
      const result = await fn();
      logger.debug('Executed query', {
        query: sql,
        duration: `${Date.now() - start}ms`,
      });
      return result;
    } catch (error) {
      logger.error('Database query error', {
        query: sql,
        params: params?.map((value) => (value === null ? null : String(value))),
        duration: `${Date.now() - start}ms`,
        error: describeError(error),
      });
      if (isOutOfMemory(error)) {
        throw new ResourceLimitError(`Query exceeded the configured memory limit: ${describeError(error)}`, { path: this.path }, error);
      }
      throw error;
    }
  }
}

function assertMemoryLimit(value: string): void {
  if (!isValidMemoryLimit(value)) {
    throw new AnalyticsError(`Invalid memory limit '${value}'`, 'INVALID_SETTING', 400, { memoryLimit: value });
  }
}

function assertThreads(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new AnalyticsError(`Invalid thread count '${value}'`, 'INVALID_SETTING', 400, { threads: value });
  }
}
