/**
 * Scheduler: per-source interval timers, persisted retries with backoff,
 * tiered worker pools, and the crash-recovery scan over the job ledger.
 */

import cron from 'node-cron';
import pLimit from 'p-limit';
import type { CacheManager } from '../cache/cacheManager.js';
import type { JobRunner, RunOutcome } from '../collect/orchestrator.js';
import type { Config } from '../shared/config.js';
import { FatalError, JobConflictError, classifyError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SourceDefinition, SourceTable } from '../sources/registry.js';
import type { SourcePriority } from '../sources/types.js';
import { retryDelayMs } from './backoff.js';
import type { RetryPolicy } from './backoff.js';
import type { CollectionJob, JobStore } from './jobStore.js';
import { nextStep } from './stateMachine.js';

type Timer = ReturnType<typeof setTimeout>;
type Pool = ReturnType<typeof pLimit>;

export interface SchedulerDeps {
  jobs: JobStore;
  runner: JobRunner;
  sources: SourceTable;
  config: Config['scheduler'];
  /** Cached admin status is dropped whenever a source's scheduling state changes. */
  cache?: CacheManager;
  /** Source of jitter; tests pin it. */
  random?: () => number;
}

export interface SourceStatus {
  key: string;
  nextRun: string | null;
  lastRun: string | null;
  lastSuccess: string | null;
  consecutiveFailures: number;
  lastError: string | null;
  paused: boolean;
  inFlightJobId: string | null;
  pendingRetryAt: string | null;
}

export interface RecoveryReport {
  replayed: number;
  superseded: number;
  retriesRearmed: number;
}

interface PendingRetry {
  timer: Timer;
  jobId: string;
  at: string;
}

export class Scheduler {
  private readonly jobs: JobStore;
  private readonly runner: JobRunner;
  private readonly sources: SourceTable;
  private readonly config: Config['scheduler'];
  private readonly cache: CacheManager | undefined;
  private readonly random: () => number;
  private readonly policy: RetryPolicy;
  private readonly pools: Record<SourcePriority, Pool>;

  private readonly intervalTimers = new Map<string, Timer>();
  private readonly retryTimers = new Map<string, PendingRetry>();
  /** source key → job id, from dispatch until the run settles. */
  private readonly inFlight = new Map<string, string>();
  private readonly running = new Set<Promise<void>>();

  private started = false;
  private halted = false;
  private recheckTimer: ReturnType<typeof setInterval> | null = null;
  private maintenanceTask: cron.ScheduledTask | null = null;

  constructor(deps: SchedulerDeps) {
    this.jobs = deps.jobs;
    this.runner = deps.runner;
    this.sources = deps.sources;
    this.config = deps.config;
    this.cache = deps.cache;
    this.random = deps.random ?? Math.random;
    this.policy = {
      baseDelayMs: deps.config.retry.base_delay_ms,
      maxDelayMs: deps.config.retry.max_delay_ms,
      jitterRatio: deps.config.retry.jitter_ratio,
    };
    this.pools = {
      high: pLimit(deps.config.tiers.high.concurrency),
      medium: pLimit(deps.config.tiers.medium.concurrency),
      low: pLimit(deps.config.tiers.low.concurrency),
    };
  }

  get isHalted(): boolean {
    return this.halted;
  }

  /**
   * Recover orphans, arm every enabled source (spread by the initial
   * jitter) and start the maintenance cron.
   */
  start(): RecoveryReport {
    if (this.started) throw new FatalError('Scheduler already started');
    this.started = true;

    const report = this.recover();
    for (const source of this.sources.enabled()) {
      this.schedule(source, Math.round(this.random() * this.config.initial_jitter_ms));
    }

    const expr = this.config.maintenance_cron;
    if (expr) {
      if (cron.validate(expr)) {
        this.maintenanceTask = cron.schedule(expr, () => {
          this.maintenance();
        });
      } else {
        logger.warn({ maintenance_cron: expr }, 'Invalid maintenance_cron expression, maintenance disabled');
      }
    }

    logger.info({ sources: this.sources.enabled().length, ...report }, 'Scheduler started');
    return report;
  }

  /** Stop all timers and wait for in-flight runs to settle. */
  async stop(): Promise<void> {
    this.started = false;
    for (const timer of this.intervalTimers.values()) clearTimeout(timer);
    this.intervalTimers.clear();
    for (const pending of this.retryTimers.values()) clearTimeout(pending.timer);
    this.retryTimers.clear();
    if (this.recheckTimer) clearInterval(this.recheckTimer);
    this.recheckTimer = null;
    this.maintenanceTask?.stop();
    this.maintenanceTask = null;
    await this.whenIdle();
    logger.info('Scheduler stopped');
  }

  /** Arm the interval timer for a source. Defaults to one full interval. */
  schedule(source: SourceDefinition, delayMs = source.interval * 60_000): void {
    const existing = this.intervalTimers.get(source.key);
    if (existing) clearTimeout(existing);
    if (!source.enabled || this.jobs.isPaused(source.key)) {
      this.intervalTimers.delete(source.key);
      return;
    }

    const at = new Date(Date.now() + delayMs).toISOString();
    this.intervalTimers.set(
      source.key,
      setTimeout(() => this.onIntervalTick(source), delayMs),
    );
    this.jobs.setNextRun(source.key, at);
    this.stateChanged(source.key);
  }

  triggerNow(key: string): CollectionJob {
    const source = this.sources.require(key);
    if (this.halted) {
      throw new FatalError('Scheduler is halted until the store is reachable again', { source_key: key });
    }
    const inFlightJobId = this.inFlight.get(key);
    if (inFlightJobId) {
      throw new JobConflictError(`Collection already in flight for ${key}`, {
        source_key: key,
        job_id: inFlightJobId,
      });
    }

    const job = this.jobs.transaction(() => {
      for (const pending of this.jobs.findPendingRetries(key)) {
        this.jobs.clearPendingRetry(pending.job_id);
      }
      return this.jobs.createJob({ source_key: key, trigger_kind: 'manual', attempt_count: 0 });
    });
    this.cancelRetryTimer(key);

    logger.info({ source: key, job_id: job.job_id }, 'Manual collection triggered');
    this.dispatch(source, job);
    return job;
  }

  /** Stop triggering a source. A run already in flight finishes. */
  pause(key: string): void {
    this.sources.require(key);
    this.jobs.setPaused(key, true);
    const timer = this.intervalTimers.get(key);
    if (timer) clearTimeout(timer);
    this.intervalTimers.delete(key);
    this.jobs.setNextRun(key, null);
    this.cancelRetryTimer(key);
    this.stateChanged(key);
    logger.info({ source: key }, 'Source paused');
  }

  resume(key: string): void {
    const source = this.sources.require(key);
    this.jobs.setPaused(key, false);
    if (this.started && !this.halted) {
      this.schedule(source);
      const [pending] = this.jobs.findPendingRetries(key);
      if (pending?.next_retry_at) this.armRetry(source, pending.job_id, pending.next_retry_at);
    }
    this.stateChanged(key);
    logger.info({ source: key }, 'Source resumed');
  }

  getStatus(key: string): SourceStatus {
    this.sources.require(key);
    const state = this.jobs.getSourceState(key);
    const pendingRetryAt = this.retryTimers.get(key)?.at ?? this.jobs.findPendingRetries(key)[0]?.next_retry_at ?? null;
    return {
      key,
      nextRun: state.next_run_at,
      lastRun: state.last_run_at,
      lastSuccess: state.last_success_at,
      consecutiveFailures: state.consecutive_failures,
      lastError: state.last_error,
      paused: state.paused === 1,
      inFlightJobId: this.inFlight.get(key) ?? null,
      pendingRetryAt,
    };
  }

  /**
   * Replay orphaned jobs and re-arm persisted retries. A running orphan is
   * closed as interrupted and replaced by one recovery job in the same
   * transaction; a scheduled orphan runs as-is. Extra orphans for one
   * source are closed as superseded.
   */
  recover(): RecoveryReport {
    const staleBefore = new Date(Date.now() - this.config.heartbeat_timeout_ms).toISOString();
    const orphans = this.jobs.findOrphans(staleBefore, [...this.inFlight.values()]);
    const report: RecoveryReport = { replayed: 0, superseded: 0, retriesRearmed: 0 };
    const claimed = new Set<string>();
    const toRun: Array<{ source: SourceDefinition; job: CollectionJob }> = [];

    // Newest first, so the kept orphan is the latest one.
    for (const orphan of orphans) {
      const source = this.sources.get(orphan.source_key);
      const keep =
        source !== undefined && source.enabled && !claimed.has(orphan.source_key) && !this.inFlight.has(orphan.source_key);
      claimed.add(orphan.source_key);

      const replay = this.jobs.transaction((): CollectionJob | null => {
        if (!source || !keep) {
          this.jobs.markFailed(orphan.job_id, { error: 'Superseded by a newer job', error_kind: 'superseded' });
          return null;
        }
        if (this.jobs.isPaused(source.key)) {
          // Parked as a pending retry; resume() picks it up.
          this.jobs.markFailed(orphan.job_id, {
            error: 'Interrupted while source was paused',
            error_kind: 'interrupted',
            next_retry_at: new Date().toISOString(),
            retry_attempt: orphan.attempt_count,
          });
          return null;
        }
        if (orphan.status === 'running') {
          this.jobs.markFailed(orphan.job_id, { error: 'Interrupted by process restart', error_kind: 'interrupted' });
          return this.jobs.createJob({
            source_key: orphan.source_key,
            trigger_kind: 'recovery',
            attempt_count: orphan.attempt_count,
            parent_job_id: orphan.job_id,
          });
        }
        return orphan;
      });

      if (replay && source) {
        toRun.push({ source, job: replay });
      } else if (!keep) {
        report.superseded++;
      }
    }

    for (const key of claimed) this.stateChanged(key);

    for (const { source, job } of toRun) {
      logger.warn({ source: source.key, job_id: job.job_id, trigger: job.trigger_kind }, 'Replaying orphaned job');
      this.dispatch(source, job);
      report.replayed++;
    }

    report.retriesRearmed = this.rearmRetries();
    if (report.replayed > 0 || report.superseded > 0 || report.retriesRearmed > 0) {
      logger.info(report, 'Recovery scan complete');
    }
    return report;
  }

  /** Resolves once no run is in flight. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  /** Recovery scan plus pruning of finished jobs past retention. */
  maintenance(): void {
    if (this.halted) return;
    try {
      this.recover();
      const cutoff = new Date(Date.now() - this.config.job_retention_days * 86_400_000).toISOString();
      const pruned = this.jobs.pruneFinished(cutoff);
      if (pruned > 0) logger.info({ pruned }, 'Pruned finished jobs');
    } catch (err) {
      this.handleStoreError(err, 'maintenance');
    }
  }

  // ================================================================
  // Internals
  // ================================================================

  private onIntervalTick(source: SourceDefinition): void {
    this.intervalTimers.delete(source.key);
    if (!this.started || this.halted) return;

    try {
      this.schedule(source);
      if (this.jobs.isPaused(source.key)) return;
      if (this.inFlight.has(source.key) || this.retryTimers.has(source.key)) {
        logger.debug({ source: source.key }, 'Interval tick skipped, source busy');
        return;
      }
      const job = this.jobs.createJob({ source_key: source.key, trigger_kind: 'interval', attempt_count: 0 });
      this.dispatch(source, job);
    } catch (err) {
      this.handleStoreError(err, 'interval tick');
    }
  }

  private dispatch(source: SourceDefinition, job: CollectionJob): void {
    this.inFlight.set(source.key, job.job_id);
    this.stateChanged(source.key);
    const run = this.pools[source.priority](() => this.execute(source, job))
      .catch((err: unknown) => {
        logger.error({ source: source.key, job_id: job.job_id, error: errorMessage(err) }, 'Job execution crashed');
      })
      .finally(() => {
        if (this.inFlight.get(source.key) === job.job_id) this.inFlight.delete(source.key);
        this.stateChanged(source.key);
        this.running.delete(run);
      });
    this.running.add(run);
  }

  private async execute(source: SourceDefinition, job: CollectionJob): Promise<void> {
    if (this.halted) {
      this.deferWhileHalted(job);
      return;
    }

    let current: CollectionJob;
    try {
      current = this.jobs.markRunning(job.job_id);
      this.jobs.recordRunStart(source.key);
    } catch (err) {
      this.handleStoreError(err, 'start job', job.job_id);
      return;
    }
    this.stateChanged(source.key);

    const heartbeat = setInterval(() => {
      try {
        this.jobs.heartbeat(current.job_id);
      } catch (err) {
        logger.warn({ job_id: current.job_id, error: errorMessage(err) }, 'Heartbeat failed');
      }
    }, this.config.heartbeat_interval_ms);

    let outcome: RunOutcome;
    try {
      outcome = await this.runner.run(source, current);
    } catch (err) {
      outcome = { status: 'failed', reason: classifyError(err), error: errorMessage(err) };
    } finally {
      clearInterval(heartbeat);
    }

    try {
      await this.handleOutcome(source, current, outcome);
    } catch (err) {
      this.handleStoreError(err, 'finish job', current.job_id);
    }
  }

  private async handleOutcome(source: SourceDefinition, job: CollectionJob, outcome: RunOutcome): Promise<void> {
    if (outcome.status === 'succeeded') {
      const { stats } = outcome;
      this.jobs.transaction(() => {
        this.jobs.markSucceeded(job.job_id, {
          items_fetched: stats.itemsFetched,
          items_stored: stats.itemsStored,
          items_duplicate: stats.itemsDuplicate,
          item_errors: stats.errors,
        });
        this.jobs.recordSuccess(source.key);
      });
      logger.info({ source: source.key, job_id: job.job_id, ...stats }, 'Collection succeeded');
      return;
    }

    const step = nextStep(outcome.reason, job.attempt_count, source.max_retries);
    const log = { source: source.key, job_id: job.job_id, attempt: job.attempt_count, reason: outcome.reason, error: outcome.error };

    switch (step.action) {
      case 'retry':
      case 'requeue': {
        const delay =
          step.action === 'retry'
            ? retryDelayMs(job.attempt_count, this.policy, this.random)
            : outcome.retryAfterMs ?? this.config.capacity_delay_ms;
        const at = new Date(Date.now() + delay).toISOString();
        this.jobs.transaction(() => {
          this.jobs.markFailed(job.job_id, {
            error: outcome.error,
            error_kind: outcome.reason,
            next_retry_at: at,
            retry_attempt: step.attempt,
          });
          this.jobs.recordFailure(source.key, outcome.error, step.action === 'retry');
        });
        logger.warn({ ...log, delay_ms: delay, next_attempt: step.attempt }, `Collection failed, ${step.action} scheduled`);
        if (!this.jobs.isPaused(source.key)) this.armRetry(source, job.job_id, at);
        return;
      }
      case 'dead-letter': {
        this.jobs.transaction(() => {
          this.jobs.markFailed(job.job_id, { error: outcome.error, error_kind: outcome.reason });
          this.jobs.markDeadLettered(job.job_id);
          this.jobs.recordFailure(source.key, outcome.error, true);
        });
        logger.error(log, 'Collection dead-lettered');
        await this.runner.raiseDeadLetterAlert(source, { ...job, last_error: outcome.error });
        return;
      }
      case 'halt': {
        try {
          this.jobs.markFailed(job.job_id, {
            error: outcome.error,
            error_kind: outcome.reason,
            next_retry_at: new Date().toISOString(),
            retry_attempt: job.attempt_count,
          });
        } catch (err) {
          logger.warn({ job_id: job.job_id, error: errorMessage(err) }, 'Could not record fatal failure');
        }
        this.enterHalt(outcome.error);
        return;
      }
    }
  }

  private armRetry(source: SourceDefinition, parentJobId: string, at: string): void {
    this.cancelRetryTimer(source.key);
    const delay = Math.max(0, Date.parse(at) - Date.now());
    const timer = setTimeout(() => this.fireRetry(source, parentJobId), delay);
    this.retryTimers.set(source.key, { timer, jobId: parentJobId, at });
    this.stateChanged(source.key);
  }

  private cancelRetryTimer(key: string): void {
    const pending = this.retryTimers.get(key);
    if (pending) clearTimeout(pending.timer);
    this.retryTimers.delete(key);
  }

  private fireRetry(source: SourceDefinition, parentJobId: string): void {
    this.retryTimers.delete(source.key);
    if (!this.started || this.halted) return;

    try {
      if (this.jobs.isPaused(source.key)) return;
      if (this.inFlight.has(source.key)) {
        this.armRetry(source, parentJobId, new Date(Date.now() + this.config.capacity_delay_ms).toISOString());
        return;
      }
      const job = this.jobs.transaction((): CollectionJob | null => {
        const parent = this.jobs.findPendingRetries(source.key).find((j) => j.job_id === parentJobId);
        if (!parent) return null;
        return this.jobs.createJob({
          source_key: source.key,
          trigger_kind: 'retry',
          attempt_count: parent.retry_attempt ?? parent.attempt_count + 1,
          parent_job_id: parent.job_id,
        });
      });
      if (job) this.dispatch(source, job);
    } catch (err) {
      this.handleStoreError(err, 'retry');
    }
  }

  /** Arm one persisted retry per source; extra ones are cancelled. */
  private rearmRetries(): number {
    let rearmed = 0;
    const seen = new Set<string>();
    const pending = [...this.jobs.findPendingRetries()].reverse();
    for (const job of pending) {
      const source = this.sources.get(job.source_key);
      if (!source || !source.enabled || seen.has(job.source_key)) {
        this.jobs.clearPendingRetry(job.job_id);
        this.stateChanged(job.source_key);
        continue;
      }
      seen.add(job.source_key);
      if (!this.started || this.jobs.isPaused(job.source_key) || !job.next_retry_at) continue;
      if (this.retryTimers.get(job.source_key)?.jobId === job.job_id) continue;
      this.armRetry(source, job.job_id, job.next_retry_at);
      rearmed++;
    }
    return rearmed;
  }

  /**
   * Drop the cached status of a source. The invalidation is tracked like a
   * run, so `whenIdle()` also waits for it.
   */
  private stateChanged(key: string): void {
    const { cache } = this;
    if (!cache) return;
    const pending: Promise<void> = cache
      .invalidatePattern(cache.patternFor('status', key))
      .then(
        () => undefined,
        (err: unknown) => {
          logger.warn({ source: key, error: errorMessage(err) }, 'Status cache invalidation failed');
        },
      )
      .finally(() => {
        this.running.delete(pending);
      });
    this.running.add(pending);
  }

  /** A job reached the pool after scheduling halted; park it as a pending retry. */
  private deferWhileHalted(job: CollectionJob): void {
    try {
      this.jobs.markFailed(job.job_id, {
        error: 'Scheduler halted before the job started',
        error_kind: 'fatal',
        next_retry_at: new Date().toISOString(),
        retry_attempt: job.attempt_count,
      });
    } catch (err) {
      logger.warn({ job_id: job.job_id, error: errorMessage(err) }, 'Could not defer job while halted');
    }
  }

  private handleStoreError(err: unknown, op: string, jobId?: string): void {
    const message = errorMessage(err);
    if (classifyError(err) === 'fatal') {
      this.enterHalt(message);
      return;
    }
    logger.error({ op, job_id: jobId, error: message }, 'Scheduler operation failed');
  }

  private enterHalt(reason: string): void {
    if (this.halted) return;
    this.halted = true;
    for (const timer of this.intervalTimers.values()) clearTimeout(timer);
    this.intervalTimers.clear();
    for (const pending of this.retryTimers.values()) clearTimeout(pending.timer);
    this.retryTimers.clear();
    logger.error({ reason, recheck_interval_ms: this.config.fatal_recheck_interval_ms }, 'Scheduling halted');
    this.recheckTimer = setInterval(() => this.recheckStore(), this.config.fatal_recheck_interval_ms);
  }

  private recheckStore(): void {
    try {
      this.jobs.ping();
    } catch (err) {
      logger.debug({ error: errorMessage(err) }, 'Store still unavailable');
      return;
    }

    if (this.recheckTimer) clearInterval(this.recheckTimer);
    this.recheckTimer = null;
    this.halted = false;
    logger.info('Store reachable again, scheduling resumed');

    if (!this.started) return;
    try {
      for (const source of this.sources.enabled()) this.schedule(source);
      this.recover();
    } catch (err) {
      this.handleStoreError(err, 'resume after halt');
    }
  }
}
