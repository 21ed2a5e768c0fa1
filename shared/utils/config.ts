import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import path from 'path';
import { ConfigurationError } from './errors';

// Load environment variables from .env file
dotenvConfig({ path: path.resolve(process.cwd(), '.env') });

// DuckDB accepts sizes such as 512MB, 4GB or 1.5GiB
const MEMORY_LIMIT_PATTERN = /^\d+(\.\d+)?\s*(B|KB|MB|GB|TB|KiB|MiB|GiB|TiB)$/i;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const FREQUENCY_BASES = ['purchase_events', 'purchase_days'] as const;
export type FrequencyBasis = (typeof FREQUENCY_BASES)[number];

// Define comprehensive configuration schema
const configSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Database
  DUCKDB_PATH: z.string().min(1).default('data/db/behavior.duckdb'),
  DUCKDB_MEMORY_LIMIT: z.string().regex(MEMORY_LIMIT_PATTERN, 'expected a size such as 4GB').default('4GB'),
  DUCKDB_THREADS: z.coerce.number().int().positive().default(4),

  // Ingestion
  RAW_EVENTS_PATH: z.string().min(1).default('data/raw/events.parquet'),

  // Pipeline tunables
  AFFINITY_MIN_SUPPORT: z.coerce.number().int().positive().default(5),
  AFFINITY_MIN_LIFT: z.coerce.number().nonnegative().default(1.2),
  RFM_FREQUENCY_BASIS: z.enum(FREQUENCY_BASES).default('purchase_events'),
  RETENTION_MIN_COHORT_SIZE: z.coerce.number().int().nonnegative().default(10),
  CHURN_AT_RISK_DAYS: z.coerce.number().int().nonnegative().default(7),
  CHURN_DAYS: z.coerce.number().int().nonnegative().default(14),
  PROPENSITY_CUTOFF: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD').optional(),

  // Insights API
  INSIGHTS_API_PORT: z.coerce.number().int().positive().default(3010),
  INSIGHTS_API_HOST: z.string().default('0.0.0.0'),
  ALLOWED_ORIGINS: z.string().optional(),

  // Rate Limiting
  RATE_LIMIT_ENABLED: booleanFlag.default('true'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(600),

  // Monitoring
  METRICS_ENABLED: booleanFlag.default('true'),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration from a key/value source, read once per run.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = configSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  if (parsed.data.CHURN_DAYS < parsed.data.CHURN_AT_RISK_DAYS) {
    throw new ConfigurationError('Invalid configuration: CHURN_DAYS must be >= CHURN_AT_RISK_DAYS', {
      CHURN_DAYS: parsed.data.CHURN_DAYS,
      CHURN_AT_RISK_DAYS: parsed.data.CHURN_AT_RISK_DAYS,
    });
  }
  return parsed.data;
}

/**
 * Explicit settings handed to every pipeline stage.
 */
export interface PipelineSettings {
  databasePath: string;
  memoryLimit: string;
  threads: number;
  rawEventsPath: string;
  minSupport: number;
  minLift: number;
  /** RFM scores are quintiles; the segment table assumes 1..5. */
  quantileCount: 5;
  rfmFrequencyBasis: FrequencyBasis;
  minCohortSize: number;
  churnAtRiskDays: number;
  churnDays: number;
  propensityCutoff?: string;
}

export function toPipelineSettings(config: AppConfig): PipelineSettings {
  return {
    databasePath: config.DUCKDB_PATH,
    memoryLimit: config.DUCKDB_MEMORY_LIMIT,
    threads: config.DUCKDB_THREADS,
    rawEventsPath: config.RAW_EVENTS_PATH,
    minSupport: config.AFFINITY_MIN_SUPPORT,
    minLift: config.AFFINITY_MIN_LIFT,
    quantileCount: 5,
    rfmFrequencyBasis: config.RFM_FREQUENCY_BASIS,
    minCohortSize: config.RETENTION_MIN_COHORT_SIZE,
    churnAtRiskDays: config.CHURN_AT_RISK_DAYS,
    churnDays: config.CHURN_DAYS,
    propensityCutoff: config.PROPENSITY_CUTOFF,
  };
}

export function isValidMemoryLimit(value: string): boolean {
  return MEMORY_LIMIT_PATTERN.test(value);
}
