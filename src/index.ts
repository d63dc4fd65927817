// src/index.ts

export { InventoryPipeline } from './pipeline';
export type { StageOptions, UserDetailStageOptions, PipelineStage } from './pipeline';
export { validateConfig, validateConfigSafe, PipelineConfigSchema } from './config/ConfigValidator';
export type { PipelineConfig, InventorySourceName, InteractionType, PackageRegistry } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';
export { mergeInventories, manualListToEntries } from './services/MergeDedupService';
export type { MergeInput, MergeResult } from './services/MergeDedupService';
export { normalizeName, normalizeUrl } from './core/inventory/normalize';
export type {
  InventoryEntry,
  ToolRecord,
  ToolStats,
  DroppedRecord,
  ExclusionEntry,
  ManualListEntry,
} from './core/inventory/types';
export type { UserInteractionRecord, UserDetailRecord } from './core/users/types';
export type { InventorySummary } from './services/InventoryLoader';
export type { RefreshSummary } from './services/RefreshController';
export type { CollectionSummary } from './services/InteractionCollector';
export type { UserDetailSummary } from './services/UserDetailCollector';
export type { ClassificationSummary } from './services/UserClassifier';
export type { Connector, FetchParams } from './connectors/types';
export { BaseConnector } from './connectors/BaseConnector';

// Export error classes for error handling
export {
  PipelineError,
  ConfigError,
  SourceUnavailableError,
  TotalConnectivityError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  QuotaExceededError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
  RunCancelledError,
} from './utils/errors';
