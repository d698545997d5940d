import cron from 'node-cron';
import { AdminService } from './admin/service.js';
import { CacheManager } from './cache/cacheManager.js';
import { MemoryCacheStore, SqliteCacheStore } from './cache/store.js';
import type { CacheStore } from './cache/store.js';
import { CollectionOrchestrator } from './collect/orchestrator.js';
import type { AdapterResolver } from './collect/orchestrator.js';
import { SqliteRecordStore } from './collect/recordStore.js';
import { closeDb, openDb } from './db/db.js';
import type { Db } from './db/db.js';
import { runMigrations } from './db/migrate.js';
import { BatchProcessor } from './enrich/batchProcessor.js';
import { LexiconModel } from './enrich/lexiconModel.js';
import { LlmModel } from './enrich/llmModel.js';
import type { EnrichmentModel } from './enrich/types.js';
import { LlmClient } from './llm/client.js';
import { RateLimiterRegistry } from './ratelimit/rateLimiter.js';
import { JobStore } from './scheduler/jobStore.js';
import { Scheduler } from './scheduler/scheduler.js';
import type { RecoveryReport } from './scheduler/scheduler.js';
import type { Config } from './shared/config.js';
import { ConfigError, errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { AdapterRegistry } from './sources/adapters/index.js';
import { loadSources } from './sources/registry.js';
import type { SourceTable } from './sources/registry.js';

export interface RuntimeOptions {
  config: Config;
  /** Defaults to `config.db.path`. */
  db?: Db;
  sources?: SourceTable;
  model?: EnrichmentModel;
  adapters?: AdapterResolver;
}

export interface Runtime {
  config: Config;
  db: Db;
  sources: SourceTable;
  cache: CacheManager;
  jobs: JobStore;
  records: SqliteRecordStore;
  enrichment: BatchProcessor;
  orchestrator: CollectionOrchestrator;
  scheduler: Scheduler;
  admin: AdminService;
  /** Start scheduling and the cache purge task. */
  start(): RecoveryReport;
  shutdown(): Promise<void>;
}

export function createModel(config: Config): EnrichmentModel {
  if (config.enrichment.model === 'lexicon') return new LexiconModel();

  const client = new LlmClient(config.llm);
  if (!client.isConfigured()) {
    throw new ConfigError('enrichment.model is "llm" but llm.api_key is not set');
  }
  return new LlmModel(client);
}

/**
 * Wire every component from one validated config. Nothing here is a
 * module-level singleton; callers own the returned runtime.
 */
export function createRuntime(opts: RuntimeOptions): Runtime {
  const { config } = opts;
  const sources = opts.sources ?? loadSources(config);
  const db = opts.db ?? openDb(config.db.path);
  runMigrations(db);

  const cacheStore: CacheStore = config.cache.backend === 'sqlite' ? new SqliteCacheStore(db) : new MemoryCacheStore();
  const cache = new CacheManager(cacheStore, config.cache.version);
  const jobs = new JobStore(db);
  const records = new SqliteRecordStore(db);

  const enrichment = new BatchProcessor(opts.model ?? createModel(config), cache, {
    batchSize: config.enrichment.batch_size,
    batchTimeoutMs: config.enrichment.batch_timeout_ms,
    maxConcurrentBatches: config.enrichment.max_concurrent_batches,
    cacheTtlSeconds: config.enrichment.cache_ttl_seconds,
  });

  const orchestrator = new CollectionOrchestrator({
    store: records,
    adapters:
      opts.adapters ??
      new AdapterRegistry({ userAgent: config.fetch.user_agent, timeoutMs: config.fetch.timeout_ms }),
    limiter: new RateLimiterRegistry({
      windowMs: config.rate_limit.window_ms,
      maxWaitMs: config.rate_limit.max_wait_ms,
    }),
    enricher: enrichment,
    cache,
    sources,
    alertRules: config.alerts.rules,
    fetchTimeoutMs: config.fetch.timeout_ms,
    responseCacheSeconds: config.fetch.response_cache_seconds,
  });

  const scheduler = new Scheduler({ jobs, runner: orchestrator, sources, config: config.scheduler, cache });
  const admin = new AdminService({ scheduler, jobs, store: records, cache, sources, tester: orchestrator, enrichment });

  let purgeTask: cron.ScheduledTask | null = null;

  return {
    config,
    db,
    sources,
    cache,
    jobs,
    records,
    enrichment,
    orchestrator,
    scheduler,
    admin,

    start() {
      const report = scheduler.start();
      const expr = config.cache.purge_cron;
      if (expr && cron.validate(expr)) {
        purgeTask = cron.schedule(expr, () => {
          cache
            .purgeExpired()
            .then((purged) => {
              if (purged > 0) logger.debug({ purged }, 'Expired cache entries purged');
            })
            .catch((err: unknown) => logger.warn({ error: errorMessage(err) }, 'Cache purge failed'));
        });
      } else if (expr) {
        logger.warn({ purge_cron: expr }, 'Invalid cache.purge_cron expression, purge disabled');
      }
      return report;
    },

    async shutdown() {
      purgeTask?.stop();
      purgeTask = null;
      await scheduler.stop();
      await enrichment.close();
      closeDb(db);
    },
  };
}
