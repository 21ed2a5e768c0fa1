import { promises as fs } from 'fs';
import { AnalyticsDatabase, AppConfig, createServiceLogger } from '@shopper-insights/shared';

const logger = createServiceLogger('insights-api');

const IN_MEMORY = ':memory:';

export type DatabaseConfig = Pick<AppConfig, 'DUCKDB_PATH' | 'DUCKDB_MEMORY_LIMIT' | 'DUCKDB_THREADS'>;

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Opens the published database read-only. Until the pipeline has written the
 * file, an empty in-memory session stands in and every endpoint answers with
 * its unpublished-table placeholders.
 */
export async function openInsightsDatabase(config: DatabaseConfig): Promise<AnalyticsDatabase> {
  const limits = { memoryLimit: config.DUCKDB_MEMORY_LIMIT, threads: config.DUCKDB_THREADS };

  if (config.DUCKDB_PATH === IN_MEMORY) {
    return AnalyticsDatabase.open({ path: IN_MEMORY, ...limits });
  }

  if (!(await fileExists(config.DUCKDB_PATH))) {
    logger.warn('Database file not found, serving placeholders until the pipeline has run and the API is restarted', {
      path: config.DUCKDB_PATH,
    });
    return AnalyticsDatabase.open({ path: IN_MEMORY, ...limits });
  }

  return AnalyticsDatabase.open({ path: config.DUCKDB_PATH, readOnly: true, ...limits });
}
