// Analytics pipeline - library entry point. The command line lives in ./cli

export * from './types';
export { STAGES, STAGE_NAMES, PipelineRunner, runPipeline, getStage } from './services/PipelineRunner';
export { createEventStore, appendEvents, loadEvents, inferFormat, normalizeTimestamp } from './services/EventLoader';
export { buildDimensions } from './services/DimensionalBuilder';
export { buildSessions } from './services/Sessionizer';
export { buildDailyKpis } from './services/DailyKpiAggregator';
export { buildRfmSegments, summarizeSegments } from './services/RfmSegmentationEngine';
export type { RfmOptions } from './services/RfmSegmentationEngine';
export { SEGMENT_RULES, FALLBACK_SEGMENT, SEGMENT_NAMES, assignSegment, segmentCaseExpression } from './services/SegmentRules';
export { buildRetention, summarizeChurn, CHURN_STATUSES } from './services/CohortRetentionEngine';
export type { RetentionOptions, ChurnOptions } from './services/CohortRetentionEngine';
export { buildProductAffinity } from './services/AffinityEngine';
export type { AffinityOptions } from './services/AffinityEngine';
export { buildFeatureStore } from './services/FeatureStoreBuilder';
export { buildPropensityDataset, classBalance, resolveCutoff } from './services/PropensityDatasetBuilder';
export { buildProgram, applyOverrides } from './cli';
