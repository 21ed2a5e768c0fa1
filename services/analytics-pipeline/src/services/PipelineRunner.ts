import {
  AnalyticsDatabase,
  AnalyticsError,
  MissingInputError,
  PipelineSettings,
  ServiceLogger,
  StageFailedError,
  TABLES,
  TableName,
  createServiceLogger,
  describeError,
  metrics,
  performanceLogger,
} from '@shopper-insights/shared';
import { PipelineResult, StageContext, StageDefinition, StageName, StageResult } from '../types';
import { loadEvents } from './EventLoader';
import { buildDimensions } from './DimensionalBuilder';
import { buildSessions } from './Sessionizer';
import { buildDailyKpis } from './DailyKpiAggregator';
import { buildRfmSegments, summarizeSegments } from './RfmSegmentationEngine';
import { buildRetention, summarizeChurn } from './CohortRetentionEngine';
import { buildProductAffinity } from './AffinityEngine';
import { buildFeatureStore } from './FeatureStoreBuilder';
import { buildPropensityDataset, classBalance } from './PropensityDatasetBuilder';

/**
 * Stages in execution order. Later stages read what earlier ones write.
 */
export const STAGES: readonly StageDefinition[] = [
  {
    name: 'ingest',
    description: 'Load raw events from CSV or Parquet into the Event Store',
    requires: [],
    produces: [TABLES.EVENTS],
    run: async ({ db, settings }) => {
      await loadEvents(db, { source: settings.rawEventsPath });
    },
  },
  {
    name: 'dimensions',
    description: 'Build dim_products and dim_users',
    requires: [TABLES.EVENTS],
    produces: [TABLES.DIM_PRODUCTS, TABLES.DIM_USERS],
    run: async ({ db }) => {
      await buildDimensions(db);
    },
  },
  {
    name: 'sessions',
    description: 'Group events into fact_sessions',
    requires: [TABLES.EVENTS],
    produces: [TABLES.FACT_SESSIONS],
    run: async ({ db }) => {
      await buildSessions(db);
    },
  },
  {
    name: 'daily-kpis',
    description: 'Aggregate events into fact_daily_kpis',
    requires: [TABLES.EVENTS],
    produces: [TABLES.FACT_DAILY_KPIS],
    run: async ({ db }) => {
      await buildDailyKpis(db);
    },
  },
  {
    name: 'rfm',
    description: 'Score buyers by recency, frequency and monetary value',
    requires: [TABLES.EVENTS],
    produces: [TABLES.RFM_SEGMENTS],
    run: async ({ db, settings, logger }) => {
      logger.info('Computing RFM quantiles', {
        quantiles: settings.quantileCount,
        frequencyBasis: settings.rfmFrequencyBasis,
      });
      await buildRfmSegments(db, {
        quantileCount: settings.quantileCount,
        frequencyBasis: settings.rfmFrequencyBasis,
      });
      const distribution = await summarizeSegments(db);
      logger.info('Segment distribution', { segments: distribution });
    },
  },
  {
    name: 'retention',
    description: 'Weekly cohort retention and churn risk',
    requires: [TABLES.EVENTS, TABLES.DIM_USERS],
    produces: [TABLES.WEEKLY_RETENTION, TABLES.CHURN_RISK],
    run: async ({ db, settings, logger }) => {
      await buildRetention(
        db,
        { minCohortSize: settings.minCohortSize },
        { atRiskDays: settings.churnAtRiskDays, churnDays: settings.churnDays }
      );
      logger.info('Churn status distribution', { statuses: await summarizeChurn(db) });
    },
  },
  {
    name: 'affinity',
    description: 'Market-basket association rules between co-purchased products',
    requires: [TABLES.EVENTS],
    produces: [TABLES.PRODUCT_AFFINITY],
    run: async ({ db, settings, logger }) => {
      logger.info('Computing product co-occurrences', {
        minSupport: settings.minSupport,
        minLift: settings.minLift,
      });
      await buildProductAffinity(db, { minSupport: settings.minSupport, minLift: settings.minLift });
    },
  },
  {
    name: 'features',
    description: 'Join users, RFM and session rollups into features_users',
    requires: [TABLES.DIM_USERS, TABLES.FACT_SESSIONS, TABLES.RFM_SEGMENTS],
    produces: [TABLES.FEATURES_USERS],
    run: async ({ db }) => {
      await buildFeatureStore(db);
    },
  },
  {
    name: 'propensity-dataset',
    description: 'Temporally split training set for the purchase propensity model',
    requires: [TABLES.EVENTS],
    produces: [TABLES.FEATURES_PROPENSITY],
    run: async ({ db, settings, logger }) => {
      const cutoff = await buildPropensityDataset(db, settings.propensityCutoff);
      const balance = await classBalance(db);
      logger.info('Propensity training set built', { cutoff: cutoff ?? 'none', ...balance });
    },
  },
];

export const STAGE_NAMES: readonly StageName[] = STAGES.map((stage) => stage.name);

export function getStage(name: string): StageDefinition {
  const stage = STAGES.find((candidate) => candidate.name === name);
  if (!stage) {
    throw new AnalyticsError(`Unknown stage '${name}'. Known stages: ${STAGE_NAMES.join(', ')}`, 'UNKNOWN_STAGE', 400, { stage: name });
  }
  return stage;
}

/**
 * Runs stages one at a time against a single database session. A failure
 * aborts the run; outputs of stages that already finished are left in place.
 */
export class PipelineRunner {
  private readonly logger: ServiceLogger;

  constructor(
    private readonly db: AnalyticsDatabase,
    private readonly settings: PipelineSettings,
    private readonly stages: readonly StageDefinition[] = STAGES,
    logger?: ServiceLogger
  ) {
    this.logger = logger ?? createServiceLogger('analytics-pipeline');
  }

  async run(names?: readonly string[]): Promise<PipelineResult> {
    const selected = this.select(names);
    const start = Date.now();
    const results: StageResult[] = [];

    this.logger.info('Starting pipeline', {
      stages: selected.map((stage) => stage.name),
      database: this.db.path,
      memoryLimit: this.settings.memoryLimit,
      threads: this.settings.threads,
    });

    for (const stage of selected) {
      results.push(await this.runStage(stage));
    }

    const durationMs = Date.now() - start;
    this.logger.info('Pipeline finished', { duration: `${durationMs}ms`, stages: results.length });
    return { stages: results, durationMs };
  }

  async runStage(stage: StageDefinition): Promise<StageResult> {
    const stageLogger = this.logger.child({ stage: stage.name });

    await this.db.applyResourceLimits({ memoryLimit: this.settings.memoryLimit, threads: this.settings.threads });
    await this.assertInputs(stage, stageLogger);

    stageLogger.info(`Running stage '${stage.name}'`, { description: stage.description });
    const context: StageContext = { db: this.db, settings: this.settings, logger: stageLogger };
    const start = Date.now();

    try {
      await performanceLogger.measure(`stage:${stage.name}`, () => stage.run(context), stageLogger);
    } catch (error) {
      stageLogger.error(`Stage '${stage.name}' failed`, {
        error: describeError(error),
        duration: `${Date.now() - start}ms`,
      });
      throw new StageFailedError(stage.name, error);
    }

    const durationMs = Date.now() - start;
    const rowCounts: Partial<Record<TableName, number>> = {};
    for (const table of stage.produces) {
      rowCounts[table] = await this.db.rowCount(table);
      metrics.gauge('pipeline.table.rows', rowCounts[table] ?? 0, { table });
    }

    metrics.timing('pipeline.stage.duration', durationMs, { stage: stage.name });
    stageLogger.info(`Stage '${stage.name}' complete`, { duration: `${durationMs}ms`, rowCounts });
    return { stage: stage.name, durationMs, rowCounts };
  }

  private select(names?: readonly string[]): StageDefinition[] {
    if (!names || names.length === 0) {
      return [...this.stages];
    }
    const requested = new Set(names.map((name) => getStage(name).name));
    return this.stages.filter((stage) => requested.has(stage.name));
  }

  private async assertInputs(stage: StageDefinition, stageLogger: ServiceLogger): Promise<void> {
    for (const table of stage.requires) {
      if (!(await this.db.tableExists(table))) {
        const error = new MissingInputError(table, `Stage '${stage.name}' requires table '${table}', which does not exist`, {
          stage: stage.name,
        });
        stageLogger.error(error.message);
        throw error;
      }
    }
  }
}

export async function runPipeline(
  db: AnalyticsDatabase,
  settings: PipelineSettings,
  stages?: readonly string[]
): Promise<PipelineResult> {
  return new PipelineRunner(db, settings).run(stages);
}
