import { z } from 'zod';
import { CACHE_CATEGORIES } from '../cache/cacheManager.js';
import type { CacheManager, CacheStats } from '../cache/cacheManager.js';
import type { SourceTestResult } from '../collect/orchestrator.js';
import type { Alert, AlertFilter, PersistedRecord, RecordFilter, RecordStore } from '../collect/recordStore.js';
import type { BatchProcessorStats } from '../enrich/batchProcessor.js';
import type { CollectionJob, JobFilter, JobStore } from '../scheduler/jobStore.js';
import type { Scheduler, SourceStatus } from '../scheduler/scheduler.js';
import type { JobStatus } from '../scheduler/stateMachine.js';
import { ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SourceDefinition, SourceTable } from '../sources/registry.js';

const Limit = z.coerce.number().int().min(1).max(500);
const Offset = z.coerce.number().int().min(0);
const JOB_STATUSES = ['scheduled', 'running', 'succeeded', 'failed', 'dead-lettered'] as const satisfies readonly JobStatus[];

export const JobQuerySchema = z.object({
  source: z.string().optional(),
  status: z.enum(JOB_STATUSES).optional(),
  limit: Limit.optional(),
  offset: Offset.optional(),
});

export const RecordQuerySchema = z.object({
  source: z.string().optional(),
  since: z.string().datetime().optional(),
  limit: Limit.optional(),
  offset: Offset.optional(),
});

export const AlertQuerySchema = RecordQuerySchema.extend({
  kind: z.string().optional(),
});

/** Exactly one of `pattern` (a cache glob, `*` for everything) or `source`. */
export const CacheInvalidateSchema = z
  .object({
    pattern: z.string().min(1).optional(),
    source: z.string().min(1).optional(),
  })
  .refine((body) => (body.pattern === undefined) !== (body.source === undefined), {
    message: 'Give exactly one of pattern or source',
  });

export type CacheInvalidateRequest = z.infer<typeof CacheInvalidateSchema>;

/** Parse raw (query-string) input, raising ValidationError on bad values. */
export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Invalid input', { errors: result.error.flatten().fieldErrors });
  }
  return result.data;
}

export interface SourceSummary extends SourceDefinition {
  paused: boolean;
}

export interface CacheInvalidation {
  patterns: string[];
  invalidated: number;
}

export interface AdminStats {
  halted: boolean;
  sources: { total: number; enabled: number; paused: number; failing: number };
  jobs: Record<JobStatus, number>;
  records: number;
  alerts: number;
  cache: CacheStats;
  enrichment: BatchProcessorStats | null;
}

export interface AdminDeps {
  scheduler: Scheduler;
  jobs: JobStore;
  store: RecordStore;
  cache: CacheManager;
  sources: SourceTable;
  tester: { testSource(key: string): Promise<SourceTestResult> };
  enrichment?: { getStats(): BatchProcessorStats };
}

/**
 * Operator surface over the scheduler and stores. Read paths go through
 * the cache; mutations invalidate what they touch.
 */
export class AdminService {
  constructor(private readonly deps: AdminDeps) {}

  async status(key: string): Promise<SourceStatus> {
    const { scheduler, cache, sources } = this.deps;
    sources.require(key);
    return cache.getOrSet(cache.keyFor('status', key, 'summary'), 60, async () => scheduler.getStatus(key));
  }

  async triggerNow(key: string): Promise<CollectionJob> {
    const job = this.deps.scheduler.triggerNow(key);
    await this.invalidateSource(key);
    return job;
  }

  async pause(key: string): Promise<SourceStatus> {
    this.deps.scheduler.pause(key);
    await this.invalidateSource(key);
    return this.deps.scheduler.getStatus(key);
  }

  async resume(key: string): Promise<SourceStatus> {
    this.deps.scheduler.resume(key);
    await this.invalidateSource(key);
    return this.deps.scheduler.getStatus(key);
  }

  listJobs(filter: JobFilter = {}): CollectionJob[] {
    return this.deps.jobs.listJobs(filter);
  }

  async listRecords(filter: RecordFilter = {}): Promise<PersistedRecord[]> {
    const { cache, store } = this.deps;
    const key = cache.keyFor(
      'records',
      filter.source_key ?? '_all',
      filter.since ?? '_',
      filter.limit ?? 50,
      filter.offset ?? 0,
    );
    return cache.getOrSet(key, 3600, async () => store.listRecords(filter));
  }

  async listAlerts(filter: AlertFilter = {}): Promise<Alert[]> {
    const { cache, store } = this.deps;
    const key = cache.keyFor(
      'alerts',
      filter.source_key ?? '_all',
      filter.kind ?? '_any',
      filter.since ?? '_',
      filter.limit ?? 50,
      filter.offset ?? 0,
    );
    return cache.getOrSet(key, 1800, async () => store.listAlerts(filter));
  }

  async listSources(): Promise<SourceSummary[]> {
    const { cache, sources, jobs } = this.deps;
    return cache.getOrSet(cache.keyFor('sources', 'list'), 7200, async () =>
      sources.list().map((def) => ({ ...def, paused: jobs.isPaused(def.key) })),
    );
  }

  testSource(key: string): Promise<SourceTestResult> {
    this.deps.sources.require(key);
    return this.deps.tester.testSource(key);
  }

  async stats(): Promise<AdminStats> {
    const { scheduler, jobs, store, cache, sources, enrichment } = this.deps;
    const all = sources.list();
    const states = jobs.listSourceStates().filter((s) => sources.get(s.source_key) !== undefined);
    return {
      halted: scheduler.isHalted,
      sources: {
        total: all.length,
        enabled: all.filter((s) => s.enabled).length,
        paused: states.filter((s) => s.paused === 1).length,
        failing: states.filter((s) => s.consecutive_failures > 0).length,
      },
      jobs: jobs.countByStatus(),
      records: store.countRecords(),
      alerts: store.countAlerts(),
      cache: await cache.getStats(),
      enrichment: enrichment?.getStats() ?? null,
    };
  }

  /**
   * Operator cache invalidation. A source clears every family keyed by it
   * plus the cross-source listings that include its data.
   */
  async invalidateCache(request: CacheInvalidateRequest): Promise<CacheInvalidation> {
    const { cache, sources } = this.deps;
    const key = request.source;
    let patterns: string[];
    if (key !== undefined) {
      sources.require(key);
      patterns = [
        ...CACHE_CATEGORIES.filter((c) => c !== 'nlp').map((c) => cache.patternFor(c, key)),
        cache.patternFor('records', '_all'),
        cache.patternFor('alerts', '_all'),
        cache.patternFor('sources'),
      ];
    } else {
      patterns = [request.pattern ?? '*'];
    }

    let invalidated = 0;
    for (const pattern of patterns) {
      invalidated += await cache.invalidatePattern(pattern);
    }
    logger.info({ source: key, patterns, invalidated }, 'Cache invalidated by operator');
    return { patterns, invalidated };
  }

  private async invalidateSource(key: string): Promise<void> {
    const { cache } = this.deps;
    await cache.invalidatePattern(cache.patternFor('status', key));
    await cache.invalidatePattern(cache.patternFor('sources'));
  }
}
