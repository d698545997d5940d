import type { CacheManager } from '../cache/cacheManager.js';
import type { EnrichmentPriority, EnrichmentResult } from '../enrich/types.js';
import type { RateLimiterRegistry } from '../ratelimit/rateLimiter.js';
import type { SourceDefinition, SourceTable } from '../sources/registry.js';
import type { RawItem, SourceAdapter } from '../sources/types.js';
import type { AlertRule } from '../shared/config.js';
import {
  CapacityError,
  TransientError,
  ValidationError,
  classifyError,
  errorMessage,
} from '../shared/errors.js';
import type { FailureReason } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { countWords } from '../shared/text.js';
import { generateId, nowISO } from '../shared/utils.js';
import { evaluateAlerts } from './alerts.js';
import type { AlertCandidate } from './alerts.js';
import { contentHash } from './contentHash.js';
import { difficultyScore } from './difficulty.js';
import type { RecordStore } from './recordStore.js';
import { validateItem } from './validate.js';
import type { ValidatedItem } from './validate.js';

export interface CollectStats {
  itemsFetched: number;
  itemsStored: number;
  itemsDuplicate: number;
  errors: number;
  alertsCreated: number;
  itemsUnenriched: number;
  durationMs: number;
}

export type RunOutcome =
  | { status: 'succeeded'; stats: CollectStats }
  | { status: 'failed'; reason: FailureReason; error: string; retryAfterMs?: number };

/** The job fields the orchestrator needs. */
export interface JobRef {
  job_id: string;
  trigger_kind: 'interval' | 'manual' | 'retry' | 'recovery';
  attempt_count: number;
  last_error?: string | null;
}

/** Everything the scheduler sees of collection. */
export interface JobRunner {
  run(source: SourceDefinition, job: JobRef): Promise<RunOutcome>;
  raiseDeadLetterAlert(source: SourceDefinition, job: JobRef): Promise<void>;
}

export interface Enricher {
  submit(text: string, priority: EnrichmentPriority): Promise<EnrichmentResult>;
}

export interface AdapterResolver {
  resolve(source: SourceDefinition): SourceAdapter;
}

export interface OrchestratorDeps {
  store: RecordStore;
  adapters: AdapterResolver;
  limiter: RateLimiterRegistry;
  enricher: Enricher;
  cache: CacheManager;
  sources: SourceTable;
  alertRules: readonly AlertRule[];
  fetchTimeoutMs: number;
  /** Seconds a fetched upstream response is reused. Off when 0 or absent. */
  responseCacheSeconds?: number;
}

export interface CollectOptions {
  priority?: EnrichmentPriority;
}

export interface SourceTestResult {
  key: string;
  kind: SourceDefinition['kind'];
  ok: boolean;
  latencyMs: number;
}

interface PreparedItem {
  item: ValidatedItem;
  hash: string;
  alerts: AlertCandidate[];
}

const TIER_TO_ENRICHMENT: Record<SourceDefinition['priority'], EnrichmentPriority> = {
  high: 'high',
  medium: 'normal',
  low: 'low',
};

/**
 * Collects one source end to end: fetch, validate, dedup, derive, alert,
 * persist in a single transaction, then invalidate affected cache families.
 * It is the only writer of records and alerts.
 */
export class CollectionOrchestrator implements JobRunner {
  constructor(private readonly deps: OrchestratorDeps) {}

  async collect(source: SourceDefinition, options: CollectOptions = {}): Promise<CollectStats> {
    const started = Date.now();
    const { store } = this.deps;
    const adapter = this.deps.adapters.resolve(source);

    const items = await this.fetchItems(adapter, source);

    const stats: CollectStats = {
      itemsFetched: items.length,
      itemsStored: 0,
      itemsDuplicate: 0,
      errors: 0,
      alertsCreated: 0,
      itemsUnenriched: 0,
      durationMs: 0,
    };

    const seen = new Set<string>();
    const fresh: PreparedItem[] = [];
    for (const raw of items) {
      let item: ValidatedItem;
      try {
        item = validateItem({ ...raw, source_key: source.key }, source.kind);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        stats.errors++;
        logger.debug({ source: source.key, error: err.message }, 'Item rejected');
        continue;
      }

      const hash = contentHash(item);
      if (seen.has(hash) || store.exists(source.key, hash)) {
        stats.itemsDuplicate++;
        continue;
      }
      seen.add(hash);

      const alerts =
        item.kind === 'api'
          ? evaluateAlerts(source.key, item.raw.payload['data'] ?? item.raw.payload, this.deps.alertRules)
          : [];
      fresh.push({ item, hash, alerts });
    }

    const priority = options.priority ?? TIER_TO_ENRICHMENT[source.priority];
    const enrichments = await Promise.allSettled(
      fresh.map(({ item }) =>
        item.kind === 'scraper'
          ? this.deps.enricher.submit(`${item.title ?? ''}\n${item.content}`, priority)
          : Promise.resolve(null),
      ),
    );

    const createdAt = nowISO();
    store.begin();
    try {
      for (const [i, prepared] of fresh.entries()) {
        const outcome = enrichments[i];
        let enrichment: EnrichmentResult | null = null;
        if (outcome?.status === 'fulfilled') {
          enrichment = outcome.value;
        } else if (outcome?.status === 'rejected') {
          stats.itemsUnenriched++;
        }

        const { item } = prepared;
        const derived: Record<string, unknown> =
          item.kind === 'scraper'
            ? {
                difficulty: difficultyScore(item.content),
                word_count: countWords(item.content),
                enrichment,
              }
            : {};

        const recordId = generateId();
        const inserted = store.insertOrIgnore({
          id: recordId,
          source_key: source.key,
          content_hash: prepared.hash,
          kind: item.kind,
          title: item.title,
          url: item.url,
          payload: item.raw.payload,
          derived,
          fetched_at: item.raw.fetched_at,
          created_at: createdAt,
        });
        if (!inserted) {
          stats.itemsDuplicate++;
          continue;
        }
        stats.itemsStored++;

        for (const alert of prepared.alerts) {
          store.insertAlert({ ...alert, id: generateId(), record_id: recordId, created_at: createdAt });
          stats.alertsCreated++;
        }
      }
      store.commit();
    } catch (err) {
      this.rollbackQuietly(source.key);
      throw err;
    }

    await this.invalidateAfterCommit(source.key, stats.alertsCreated > 0);

    stats.durationMs = Date.now() - started;
    logger.info({ source: source.key, ...stats }, 'Collection complete');
    return stats;
  }

  /** Never throws: failures come back classified. */
  async run(source: SourceDefinition, job: JobRef): Promise<RunOutcome> {
    try {
      const stats = await this.collect(source, {
        priority: job.trigger_kind === 'manual' ? 'critical' : undefined,
      });
      return { status: 'succeeded', stats };
    } catch (err) {
      const reason = classifyError(err);
      const error = errorMessage(err);
      logger.warn({ source: source.key, job: job.job_id, reason, error }, 'Collection failed');
      return {
        status: 'failed',
        reason,
        error,
        retryAfterMs: err instanceof CapacityError ? err.retryAfterMs : undefined,
      };
    }
  }

  async raiseDeadLetterAlert(source: SourceDefinition, job: JobRef): Promise<void> {
    const { store } = this.deps;
    store.begin();
    try {
      store.insertAlert({
        id: generateId(),
        source_key: source.key,
        kind: 'dead_letter',
        severity: 'high',
        threshold: source.max_retries,
        observed_value: job.attempt_count,
        message: `Collection for ${source.key} dead-lettered after attempt ${job.attempt_count}: ${job.last_error ?? 'unknown error'}`,
        record_id: null,
        created_at: nowISO(),
      });
      store.commit();
    } catch (err) {
      this.rollbackQuietly(source.key);
      throw err;
    }
    await this.deps.cache.invalidatePattern(this.deps.cache.patternFor('alerts'));
    logger.error({ source: source.key, job: job.job_id, attempt: job.attempt_count }, 'Job dead-lettered');
  }

  async testSource(key: string): Promise<SourceTestResult> {
    const source = this.deps.sources.require(key);
    const adapter = this.deps.adapters.resolve(source);
    const started = Date.now();
    const ok = await adapter.testConnection();
    return { key, kind: source.kind, ok, latencyMs: Date.now() - started };
  }

  /**
   * Fetch through the response cache of the source's category. Cached
   * responses spend no rate-limit budget; failed fetches are never cached.
   */
  private async fetchItems(adapter: SourceAdapter, source: SourceDefinition): Promise<RawItem[]> {
    const { cache, limiter } = this.deps;
    const fetchNow = async (): Promise<RawItem[]> => {
      await limiter.acquire(source.key, source.rate_limit);
      return this.fetchWithTimeout(adapter, source);
    };

    const ttl = this.deps.responseCacheSeconds ?? 0;
    if (ttl <= 0) return fetchNow();
    return cache.getOrSet(cache.keyFor(source.category, source.key, 'response'), ttl, fetchNow);
  }

  private async fetchWithTimeout(adapter: SourceAdapter, source: SourceDefinition): Promise<RawItem[]> {
    const timeoutMs = source.timeout_ms ?? this.deps.fetchTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TransientError(`Fetch for ${source.key} timed out after ${timeoutMs}ms`, { timeout_ms: timeoutMs }));
      }, timeoutMs);
    });

    try {
      return await Promise.race([adapter.fetch(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async invalidateAfterCommit(sourceKey: string, alertsCreated: boolean): Promise<void> {
    const { cache } = this.deps;
    try {
      await cache.invalidatePattern(cache.patternFor('records', sourceKey));
      await cache.invalidatePattern(cache.patternFor('records', '_all'));
      await cache.invalidatePattern(cache.patternFor('status', sourceKey));
      if (alertsCreated) {
        await cache.invalidatePattern(cache.patternFor('alerts'));
      }
    } catch (err) {
      // The records are committed, so the run still succeeds.
      logger.error({ source: sourceKey, error: errorMessage(err) }, 'Cache invalidation failed after commit');
    }
  }

  private rollbackQuietly(sourceKey: string): void {
    try {
      this.deps.store.rollback();
    } catch (err) {
      logger.error({ source: sourceKey, error: errorMessage(err) }, 'Rollback failed');
    }
  }
}
