// Shopper Insights Shared - Main Export File
// Configuration, logging, errors and the database session used by every service

export { loadConfig, toPipelineSettings, isValidMemoryLimit, FREQUENCY_BASES } from './utils/config';
export type { AppConfig, PipelineSettings, FrequencyBasis } from './utils/config';

export { createServiceLogger, performanceLogger, errorLogger, metrics } from './utils/logger';
export type { Logger as ServiceLogger } from './utils/logger';

export * from './utils/errors';
export * from './utils/database';
export { HealthChecker } from './utils/health';
export type { HealthCheck, ServiceHealth } from './utils/health';

// Published tables, in the order the pipeline writes them
export const TABLES = {
  EVENTS: 'events',
  DIM_USERS: 'dim_users',
  DIM_PRODUCTS: 'dim_products',
  FACT_SESSIONS: 'fact_sessions',
  FACT_DAILY_KPIS: 'fact_daily_kpis',
  RFM_SEGMENTS: 'analysis_rfm_segments',
  WEEKLY_RETENTION: 'analysis_weekly_retention',
  CHURN_RISK: 'analysis_churn_risk',
  PRODUCT_AFFINITY: 'predictions_product_affinity',
  FEATURES_USERS: 'features_users',
  FEATURES_PROPENSITY: 'features_propensity',
} as const;

export type TableName = (typeof TABLES)[keyof typeof TABLES];

export const EVENT_TYPES = {
  VIEW: 'view',
  CART: 'cart',
  REMOVE_FROM_CART: 'remove_from_cart',
  PURCHASE: 'purchase',
} as const;

export type EventType = (typeof EVENT_TYPES)[keyof typeof EVENT_TYPES];

// Defaults for users absent from the RFM table (non-buyers)
export const NON_BUYER_DEFAULTS = {
  SEGMENT: 'Browser',
  RFM_CODE: '000',
  RECENCY_DAYS: -1,
  FREQUENCY: 0,
  MONETARY: 0,
} as const;

export const NOT_AVAILABLE = 'N/A';

export const SERVICE_NAMES = {
  ANALYTICS_PIPELINE: 'analytics-pipeline',
  INSIGHTS_API: 'insights-api',
} as const;

// Version information
export const VERSION = '1.0.0';
export const API_VERSION = 'v1';
