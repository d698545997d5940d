import type { CacheManager } from '../cache/cacheManager.js';
import { EnrichmentError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sha256 } from '../shared/utils.js';
import { PriorityQueue } from './priorityQueue.js';
import type { EnrichmentModel, EnrichmentPriority, EnrichmentResult } from './types.js';

export interface BatchProcessorOptions {
  batchSize: number;
  batchTimeoutMs: number;
  maxConcurrentBatches: number;
  cacheTtlSeconds: number;
}

export interface BatchProcessorStats {
  queued: number;
  queuedByPriority: Record<EnrichmentPriority, number>;
  active: number;
  submitted: number;
  deduplicated: number;
  cacheHits: number;
  modelCalls: number;
  batches: number;
  completed: number;
  failed: number;
}

interface PendingRequest {
  hash: string;
  text: string;
  resolve: (result: EnrichmentResult) => void;
  reject: (err: EnrichmentError) => void;
}

/**
 * Accumulates enrichment requests into batches and sends each batch to the
 * model in one call.
 *
 * A batch is formed when `batchSize` requests are queued or the oldest one
 * has waited `batchTimeoutMs`, and only while fewer than
 * `maxConcurrentBatches` are in flight, so a request that arrives while all
 * slots are busy still competes on priority for the next batch.
 * Identical texts submitted concurrently share one request.
 */
export class BatchProcessor {
  private readonly queue = new PriorityQueue<PendingRequest>();
  private readonly pending = new Map<string, Promise<EnrichmentResult>>();
  private readonly idleWaiters: Array<() => void> = [];
  private timer: NodeJS.Timeout | null = null;
  private active = 0;
  private closed = false;

  private submitted = 0;
  private deduplicated = 0;
  private cacheHits = 0;
  private modelCalls = 0;
  private batches = 0;
  private completed = 0;
  private failed = 0;

  constructor(
    private readonly model: EnrichmentModel,
    private readonly cache: CacheManager,
    private readonly options: BatchProcessorOptions,
  ) {}

  submit(text: string, priority: EnrichmentPriority = 'normal'): Promise<EnrichmentResult> {
    if (this.closed) {
      return Promise.reject(new EnrichmentError('Batch processor is closed'));
    }

    this.submitted++;
    const hash = sha256(text);
    const existing = this.pending.get(hash);
    if (existing) {
      this.deduplicated++;
      return existing;
    }

    const promise = new Promise<EnrichmentResult>((resolve, reject) => {
      this.queue.push({ hash, text, resolve, reject }, priority);
    });
    this.pending.set(hash, promise);
    this.pump();
    return promise;
  }

  /** Flush everything queued and wait for in-flight batches. New submissions are rejected. */
  async close(): Promise<void> {
    this.closed = true;
    this.pump();
    await this.whenIdle();
    logger.debug(this.getStats(), 'Batch processor closed');
  }

  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  getStats(): BatchProcessorStats {
    return {
      queued: this.queue.size,
      queuedByPriority: {
        critical: this.queue.sizeOf('critical'),
        high: this.queue.sizeOf('high'),
        normal: this.queue.sizeOf('normal'),
        low: this.queue.sizeOf('low'),
      },
      active: this.active,
      submitted: this.submitted,
      deduplicated: this.deduplicated,
      cacheHits: this.cacheHits,
      modelCalls: this.modelCalls,
      batches: this.batches,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private isIdle(): boolean {
    return this.queue.size === 0 && this.active === 0;
  }

  private isDue(now: number): boolean {
    if (this.closed) return true;
    if (this.queue.size >= this.options.batchSize) return true;
    const oldest = this.queue.oldestEnqueuedAt();
    return oldest !== null && now - oldest >= this.options.batchTimeoutMs;
  }

  private pump(): void {
    while (this.active < this.options.maxConcurrentBatches && this.queue.size > 0 && this.isDue(Date.now())) {
      const batch = this.queue.take(this.options.batchSize);
      this.active++;
      void this.dispatch(batch);
    }
    this.armTimer();
  }

  private armTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const oldest = this.queue.oldestEnqueuedAt();
    if (oldest === null || this.active >= this.options.maxConcurrentBatches) return;

    const delay = Math.max(0, oldest + this.options.batchTimeoutMs - Date.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pump();
    }, delay);
  }

  private settle(req: PendingRequest, result: EnrichmentResult): void {
    this.pending.delete(req.hash);
    this.completed++;
    req.resolve(result);
  }

  private fail(req: PendingRequest, err: EnrichmentError): void {
    this.pending.delete(req.hash);
    this.failed++;
    req.reject(err);
  }

  private cacheKey(hash: string): string {
    return this.cache.keyFor('nlp', this.model.name, hash);
  }

  /** Never rejects: every request of the batch is settled. */
  private async dispatch(batch: PendingRequest[]): Promise<void> {
    try {
      const misses: PendingRequest[] = [];
      for (const req of batch) {
        const cached = await this.cache.get<EnrichmentResult>(this.cacheKey(req.hash));
        if (cached) {
          this.cacheHits++;
          this.settle(req, cached);
        } else {
          misses.push(req);
        }
      }
      if (misses.length === 0) return;

      let results: EnrichmentResult[];
      try {
        this.modelCalls++;
        results = await this.model.enrich(misses.map((r) => r.text));
        if (results.length !== misses.length) {
          throw new EnrichmentError(`Model returned ${results.length} results for ${misses.length} texts`);
        }
      } catch (err) {
        const error =
          err instanceof EnrichmentError
            ? err
            : new EnrichmentError(`Enrichment model failed: ${errorMessage(err)}`, { model: this.model.name });
        logger.warn({ model: this.model.name, size: misses.length, error: error.message }, 'Enrichment batch failed');
        for (const req of misses) this.fail(req, error);
        return;
      }

      for (const [i, req] of misses.entries()) {
        const result = results[i];
        if (!result) {
          this.fail(req, new EnrichmentError('Model returned no result', { model: this.model.name }));
          continue;
        }
        await this.cache.set(this.cacheKey(req.hash), result, this.options.cacheTtlSeconds);
        this.settle(req, result);
      }
    } catch (err) {
      // Only reachable through a cache or bookkeeping fault.
      const error = new EnrichmentError(`Enrichment dispatch failed: ${errorMessage(err)}`);
      for (const req of batch) {
        if (this.pending.has(req.hash)) this.fail(req, error);
      }
    } finally {
      this.active--;
      this.batches++;
      this.pump();
      if (this.isIdle()) {
        for (const resolve of this.idleWaiters.splice(0)) resolve();
      }
    }
  }
}
