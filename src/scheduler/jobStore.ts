import type { Db } from '../db/db.js';
import { runGuarded } from '../db/db.js';
import { JobStateError } from '../shared/errors.js';
import { generateId, nowISO } from '../shared/utils.js';
import { assertTransition } from './stateMachine.js';
import type { JobStatus, TriggerKind } from './stateMachine.js';

export interface CollectionJob {
  job_id: string;
  source_key: string;
  trigger_kind: TriggerKind;
  trigger_time: string;
  attempt_count: number;
  status: JobStatus;
  parent_job_id: string | null;
  last_error: string | null;
  error_kind: string | null;
  next_retry_at: string | null;
  retry_attempt: number | null;
  heartbeat_at: string | null;
  started_at: string | null;
  finished_at: string | null;
  items_fetched: number | null;
  items_stored: number | null;
  items_duplicate: number | null;
  item_errors: number | null;
}

export interface SourceState {
  source_key: string;
  paused: number;
  consecutive_failures: number;
  last_run_at: string | null;
  last_success_at: string | null;
  next_run_at: string | null;
  last_error: string | null;
}

export interface JobFilter {
  source_key?: string;
  status?: JobStatus;
  limit?: number;
  offset?: number;
}

export interface JobCounts {
  items_fetched: number;
  items_stored: number;
  items_duplicate: number;
  item_errors: number;
}

export interface FailureDetails {
  error: string;
  error_kind: string;
  next_retry_at?: string | null;
  retry_attempt?: number | null;
}

/**
 * Job ledger and per-source state, on the shared SQLite handle.
 * Status changes go through the state machine and are applied with a
 * compare-and-set on the previous status.
 */
export class JobStore {
  constructor(private readonly db: Db) {}

  ping(): void {
    runGuarded(this.db, 'ping', () => this.db.prepare('SELECT 1').get());
  }

  /** Run `fn` in one SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return runGuarded(this.db, 'transaction', () => this.db.transaction(fn)());
  }

  createJob(opts: {
    source_key: string;
    trigger_kind: TriggerKind;
    attempt_count: number;
    parent_job_id?: string | null;
    trigger_time?: string;
  }): CollectionJob {
    const job_id = generateId();
    runGuarded(this.db, 'create job', () =>
      this.db
        .prepare(
          `INSERT INTO collection_jobs (job_id, source_key, trigger_kind, trigger_time, attempt_count, status, parent_job_id)
           VALUES (?, ?, ?, ?, ?, 'scheduled', ?)`,
        )
        .run(
          job_id,
          opts.source_key,
          opts.trigger_kind,
          opts.trigger_time ?? nowISO(),
          opts.attempt_count,
          opts.parent_job_id ?? null,
        ),
    );
    return this.requireJob(job_id);
  }

  getJob(jobId: string): CollectionJob | undefined {
    return runGuarded(this.db, 'get job', () =>
      this.db.prepare('SELECT * FROM collection_jobs WHERE job_id = ?').get(jobId) as CollectionJob | undefined,
    );
  }

  requireJob(jobId: string): CollectionJob {
    const job = this.getJob(jobId);
    if (!job) throw new JobStateError(`Job not found: ${jobId}`, { job_id: jobId });
    return job;
  }

  listJobs(filter: JobFilter = {}): CollectionJob[] {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (filter.source_key) {
      clauses.push('source_key = ?');
      values.push(filter.source_key);
    }
    if (filter.status) {
      clauses.push('status = ?');
      values.push(filter.status);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return runGuarded(this.db, 'list jobs', () =>
      this.db
        .prepare(`SELECT * FROM collection_jobs ${where} ORDER BY trigger_time DESC, rowid DESC LIMIT ? OFFSET ?`)
        .all(...values, filter.limit ?? 50, filter.offset ?? 0) as CollectionJob[],
    );
  }

  private transition(jobId: string, to: JobStatus, sets: Record<string, unknown>): CollectionJob {
    const current = this.requireJob(jobId);
    assertTransition(jobId, current.status, to);

    const columns = Object.keys(sets);
    const assignments = ['status = ?', ...columns.map((c) => `${c} = ?`)].join(', ');
    const changes = runGuarded(this.db, `mark ${to}`, () =>
      this.db
        .prepare(`UPDATE collection_jobs SET ${assignments} WHERE job_id = ? AND status = ?`)
        .run(to, ...columns.map((c) => sets[c]), jobId, current.status).changes,
    );
    if (changes === 0) {
      throw new JobStateError(`Job ${jobId} changed status concurrently`, { job_id: jobId, expected: current.status });
    }
    return this.requireJob(jobId);
  }

  markRunning(jobId: string): CollectionJob {
    const now = nowISO();
    return this.transition(jobId, 'running', { started_at: now, heartbeat_at: now });
  }

  heartbeat(jobId: string): void {
    runGuarded(this.db, 'heartbeat', () =>
      this.db
        .prepare("UPDATE collection_jobs SET heartbeat_at = ? WHERE job_id = ? AND status = 'running'")
        .run(nowISO(), jobId),
    );
  }

  markSucceeded(jobId: string, counts: JobCounts): CollectionJob {
    return this.transition(jobId, 'succeeded', { finished_at: nowISO(), ...counts });
  }

  markFailed(jobId: string, details: FailureDetails): CollectionJob {
    return this.transition(jobId, 'failed', {
      finished_at: nowISO(),
      last_error: details.error,
      error_kind: details.error_kind,
      next_retry_at: details.next_retry_at ?? null,
      retry_attempt: details.retry_attempt ?? null,
    });
  }

  markDeadLettered(jobId: string): CollectionJob {
    return this.transition(jobId, 'dead-lettered', { next_retry_at: null, retry_attempt: null });
  }

  /** Cancel a pending retry recorded on a failed job. */
  clearPendingRetry(jobId: string): void {
    runGuarded(this.db, 'clear retry', () =>
      this.db
        .prepare("UPDATE collection_jobs SET next_retry_at = NULL, retry_attempt = NULL WHERE job_id = ? AND status = 'failed'")
        .run(jobId),
    );
  }

  /** Failed jobs with a retry time and no follow-up job yet. */
  findPendingRetries(sourceKey?: string): CollectionJob[] {
    const bySource = sourceKey ? 'AND j.source_key = ?' : '';
    return runGuarded(this.db, 'find retries', () =>
      this.db
        .prepare(
          `SELECT j.* FROM collection_jobs j
           WHERE j.status = 'failed' AND j.next_retry_at IS NOT NULL ${bySource}
             AND NOT EXISTS (SELECT 1 FROM collection_jobs c WHERE c.parent_job_id = j.job_id)
           ORDER BY j.next_retry_at`,
        )
        .all(...(sourceKey ? [sourceKey] : [])) as CollectionJob[],
    );
  }

  /**
   * Jobs left scheduled or running whose last sign of life (heartbeat, or
   * trigger time when never started) is older than `staleBefore`.
   */
  findOrphans(staleBefore: string, excludeJobIds: readonly string[] = []): CollectionJob[] {
    const rows = runGuarded(this.db, 'find orphans', () =>
      this.db
        .prepare(
          `SELECT * FROM collection_jobs
           WHERE status IN ('scheduled', 'running')
             AND trigger_time <= ?
             AND COALESCE(heartbeat_at, trigger_time) < ?
           ORDER BY trigger_time DESC, rowid DESC`,
        )
        .all(nowISO(), staleBefore) as CollectionJob[],
    );
    const excluded = new Set(excludeJobIds);
    return rows.filter((r) => !excluded.has(r.job_id));
  }

  /** Delete finished jobs older than `before`, children before parents. */
  pruneFinished(before: string): number {
    let total = 0;
    for (;;) {
      const changes = runGuarded(this.db, 'prune jobs', () =>
        this.db
          .prepare(
            `DELETE FROM collection_jobs
             WHERE status IN ('succeeded', 'failed', 'dead-lettered')
               AND finished_at IS NOT NULL AND finished_at < ?
               AND next_retry_at IS NULL
               AND NOT EXISTS (SELECT 1 FROM collection_jobs c WHERE c.parent_job_id = collection_jobs.job_id)`,
          )
          .run(before).changes,
      );
      total += changes;
      if (changes === 0) return total;
    }
  }

  countByStatus(): Record<JobStatus, number> {
    const rows = runGuarded(this.db, 'count jobs', () =>
      this.db.prepare('SELECT status, COUNT(*) AS count FROM collection_jobs GROUP BY status').all() as Array<{
        status: JobStatus;
        count: number;
      }>,
    );
    const counts: Record<JobStatus, number> = { scheduled: 0, running: 0, succeeded: 0, failed: 0, 'dead-lettered': 0 };
    for (const row of rows) counts[row.status] = row.count;
    return counts;
  }

  // ================================================================
  // Source state
  // ================================================================

  getSourceState(sourceKey: string): SourceState {
    const row = runGuarded(this.db, 'get source state', () =>
      this.db.prepare('SELECT * FROM source_state WHERE source_key = ?').get(sourceKey) as SourceState | undefined,
    );
    return (
      row ?? {
        source_key: sourceKey,
        paused: 0,
        consecutive_failures: 0,
        last_run_at: null,
        last_success_at: null,
        next_run_at: null,
        last_error: null,
      }
    );
  }

  private upsertState(sourceKey: string, column: string, expression: string, values: unknown[]): void {
    runGuarded(this.db, 'update source state', () => {
      this.db.prepare('INSERT OR IGNORE INTO source_state (source_key) VALUES (?)').run(sourceKey);
      this.db.prepare(`UPDATE source_state SET ${column} = ${expression} WHERE source_key = ?`).run(...values, sourceKey);
    });
  }

  setPaused(sourceKey: string, paused: boolean): void {
    this.upsertState(sourceKey, 'paused', '?', [paused ? 1 : 0]);
  }

  isPaused(sourceKey: string): boolean {
    return this.getSourceState(sourceKey).paused === 1;
  }

  setNextRun(sourceKey: string, at: string | null): void {
    this.upsertState(sourceKey, 'next_run_at', '?', [at]);
  }

  recordRunStart(sourceKey: string): void {
    this.upsertState(sourceKey, 'last_run_at', '?', [nowISO()]);
  }

  recordSuccess(sourceKey: string): void {
    runGuarded(this.db, 'record success', () => {
      this.db.prepare('INSERT OR IGNORE INTO source_state (source_key) VALUES (?)').run(sourceKey);
      this.db
        .prepare('UPDATE source_state SET last_success_at = ?, consecutive_failures = 0, last_error = NULL WHERE source_key = ?')
        .run(nowISO(), sourceKey);
    });
  }

  /** Capacity failures keep the error but do not extend the failure streak. */
  recordFailure(sourceKey: string, error: string, countsTowardStreak: boolean): void {
    runGuarded(this.db, 'record failure', () => {
      this.db.prepare('INSERT OR IGNORE INTO source_state (source_key) VALUES (?)').run(sourceKey);
      this.db
        .prepare(
          'UPDATE source_state SET last_error = ?, consecutive_failures = consecutive_failures + ? WHERE source_key = ?',
        )
        .run(error, countsTowardStreak ? 1 : 0, sourceKey);
    });
  }

  listSourceStates(): SourceState[] {
    return runGuarded(this.db, 'list source state', () =>
      this.db.prepare('SELECT * FROM source_state ORDER BY source_key').all() as SourceState[],
    );
  }
}
