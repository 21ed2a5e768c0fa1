import type { AnalyticsDatabase, EventType, PipelineSettings, ServiceLogger, TableName } from '@shopper-insights/shared';

/** Integer id; bigints and digit strings carry values past Number.MAX_SAFE_INTEGER. */
export type EntityId = number | bigint | string;

export interface RawEvent {
  /** `YYYY-MM-DD HH:mm:ss`, optionally suffixed with ` UTC`, or ISO 8601. */
  event_time: string;
  event_type: EventType;
  product_id: EntityId;
  category_id: EntityId;
  category_code?: string | null;
  brand?: string | null;
  price: number;
  user_id: EntityId;
  session_id?: string | null;
}

export type SourceFormat = 'csv' | 'parquet';

export interface LoadOptions {
  source: string;
  format?: SourceFormat;
}

export interface StageContext {
  db: AnalyticsDatabase;
  settings: PipelineSettings;
  logger: ServiceLogger;
}

export type StageName =
  | 'ingest'
  | 'dimensions'
  | 'sessions'
  | 'daily-kpis'
  | 'rfm'
  | 'retention'
  | 'affinity'
  | 'features'
  | 'propensity-dataset';

export interface StageDefinition {
  name: StageName;
  description: string;
  /** Tables that must exist before the stage starts. */
  requires: readonly TableName[];
  /** Tables the stage replaces wholesale. */
  produces: readonly TableName[];
  run(context: StageContext): Promise<void>;
}

export interface StageResult {
  stage: StageName;
  durationMs: number;
  rowCounts: Partial<Record<TableName, number>>;
}

export interface PipelineResult {
  stages: StageResult[];
  durationMs: number;
}

export interface RfmScores {
  r: number;
  f: number;
}

export type SegmentName =
  | 'Champions'
  | 'Loyal Customers'
  | 'New Customers'
  | 'Promising'
  | 'Need Attention'
  | 'Cant Lose Them'
  | 'Hibernating'
  | 'At Risk';

export interface ScoreBounds {
  min?: number;
  max?: number;
}

export interface SegmentRule {
  label: SegmentName;
  r: ScoreBounds;
  f: ScoreBounds;
}

export interface SegmentSummary {
  segment_name: string;
  user_count: number;
  pct_buyers: number;
  avg_spend: number;
  avg_recency: number;
}

export type ChurnStatus = 'Active' | 'At Risk' | 'Churned';

export interface ClassBalance {
  rows: number;
  positives: number;
  baselineRate: number | null;
}
