export { createRuntime, createModel } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { createApp, startServer } from './api/server.js';
export { AdminService } from './admin/service.js';
export { Scheduler } from './scheduler/scheduler.js';
export type { SourceStatus, RecoveryReport } from './scheduler/scheduler.js';
export { JobStore } from './scheduler/jobStore.js';
export type { CollectionJob, SourceState } from './scheduler/jobStore.js';
export { CollectionOrchestrator } from './collect/orchestrator.js';
export type { CollectStats, RunOutcome, JobRunner } from './collect/orchestrator.js';
export { SqliteRecordStore } from './collect/recordStore.js';
export type { RecordStore, PersistedRecord, Alert } from './collect/recordStore.js';
export { BatchProcessor } from './enrich/batchProcessor.js';
export { LexiconModel } from './enrich/lexiconModel.js';
export { LlmModel } from './enrich/llmModel.js';
export type { EnrichmentModel, EnrichmentResult, EnrichmentPriority } from './enrich/types.js';
export { CacheManager } from './cache/cacheManager.js';
export { MemoryCacheStore, SqliteCacheStore } from './cache/store.js';
export type { CacheStore } from './cache/store.js';
export { RateLimiterRegistry, SlidingWindowLimiter } from './ratelimit/rateLimiter.js';
export { AdapterRegistry, JsonApiAdapter, FeedAdapter } from './sources/adapters/index.js';
export { SourceTable, loadSources, parseSources } from './sources/registry.js';
export type { SourceDefinition } from './sources/registry.js';
export type { SourceAdapter, RawItem } from './sources/types.js';
export { loadConfig, ConfigSchema } from './shared/config.js';
export type { Config } from './shared/config.js';
export * from './shared/errors.js';
