/**
 * Customer Lifecycle Analytics
 *
 * This module turns raw transaction rows into lifecycle analyses:
 * - Frequency Segmentation: revenue concentration by visit count
 * - Retention: visit survival, magic number, VIP flow, repurchase curve
 * - RFM Scoring: recency / frequency / monetary quintiles and segments
 * - Product Attribution: entry products and BCG quadrants
 * - Cohort Analysis: first-purchase cohorts against later activity
 */

// Engine
export { AnalyticsEngine, createAnalyticsEngine } from "./engine";

export type {
  AnalyticsReport,
  AnalyzerName,
  FrequencyReport,
  SurvivalReport,
} from "./engine";

// Configuration & errors
export {
  CANONICAL_FIELDS,
  configFromEnv,
  engineConfigSchema,
  isPeriodLabel,
  resolveEngineConfig,
} from "./config";

export type {
  CanonicalField,
  ColumnMapping,
  EngineConfig,
  EngineConfigInput,
  Granularity,
} from "./config";

export {
  AnalyticsError,
  ConfigError,
  EmptyDatasetError,
  InsufficientDataError,
  InsufficientPeriodsError,
  SchemaError,
  isAnalyticsError,
  runAnalyzer,
} from "./errors";

export type {
  AnalyticsErrorKind,
  AnalyzerFailure,
  AnalyzerResult,
} from "./errors";

// Ingestion
export { normalize } from "./normalize";
export { buildCustomerSnapshots } from "./snapshots";
export {
  UNKNOWN_PERIOD,
  nextPeriod,
  periodLabel,
  periodOffset,
} from "./periods";

export type {
  CustomerSnapshot,
  IngestDiagnostics,
  NormalizedDataset,
  NormalizedRow,
  RawRecord,
  RawTable,
  TransactionRow,
} from "./types";

// Frequency Segmentation
export { segmentByFrequency, summarizeFrequency } from "./frequency";

export type {
  FrequencyBucket,
  FrequencySummary,
  FrequencySummaryOptions,
} from "./frequency";

// Retention
export {
  cohortFlow,
  findMagicNumber,
  repurchaseCurve,
  visitSurvival,
} from "./retention";

export type {
  CohortFlow,
  MagicNumberOptions,
  MagicNumberResult,
  MagicNumberRule,
  RepurchaseCurve,
  RepurchaseOptions,
  RepurchasePoint,
  SurvivalPoint,
} from "./retention";

// RFM Scoring
export {
  NEUTRAL_SCORE,
  NEUTRAL_SEGMENT_CODE,
  SEGMENT_RULES,
  getRfmSegment,
  scoreRfm,
} from "./rfm";

export type {
  RfmMetric,
  RfmOptions,
  RfmRecord,
  RfmResult,
  RfmSegment,
} from "./rfm";

// Product Attribution
export {
  BCG_RULES,
  RETENTION_RULES,
  attributeProducts,
  classifyBcg,
  classifyQuadrant,
  classifyRetention,
} from "./attribution";

export type {
  BcgProduct,
  BcgQuadrant,
  BcgResult,
  ProductAttribution,
  ProductAttributionResult,
  RetentionClass,
} from "./attribution";

// Cohort Analysis
export { buildCohortMatrix, getAverageRetentionCurve } from "./cohorts";

export type { CohortRow, RetentionMatrix } from "./cohorts";
