import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { JobStore } from '../jobStore.js';
import { FatalError, JobStateError } from '../../shared/errors.js';

describe('JobStore', () => {
  let db: Database.Database;
  let jobs: JobStore;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    jobs = new JobStore(db);
  });

  afterEach(() => {
    vi.useRealTimers();
    if (db.open) db.close();
  });

  it('creates jobs as scheduled', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    expect(job.status).toBe('scheduled');
    expect(job.attempt_count).toBe(0);
    expect(job.parent_job_id).toBeNull();
    expect(jobs.getJob(job.job_id)?.source_key).toBe('dane_ipc');
  });

  it('records the lifecycle of a successful run', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'manual', attempt_count: 0 });
    const running = jobs.markRunning(job.job_id);
    expect(running.status).toBe('running');
    expect(running.started_at).not.toBeNull();
    expect(running.heartbeat_at).toBe(running.started_at);

    const done = jobs.markSucceeded(job.job_id, {
      items_fetched: 10,
      items_stored: 7,
      items_duplicate: 3,
      item_errors: 0,
    });
    expect(done.status).toBe('succeeded');
    expect(done.items_stored).toBe(7);
    expect(done.finished_at).not.toBeNull();
  });

  it('never moves a job backwards', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'manual', attempt_count: 0 });
    jobs.markRunning(job.job_id);
    jobs.markSucceeded(job.job_id, { items_fetched: 0, items_stored: 0, items_duplicate: 0, item_errors: 0 });

    expect(() => jobs.markRunning(job.job_id)).toThrow(JobStateError);
    expect(() => jobs.markFailed(job.job_id, { error: 'late', error_kind: 'transient' })).toThrow(JobStateError);
    expect(jobs.getJob(job.job_id)?.status).toBe('succeeded');
  });

  it('rejects backwards status writes at the database level too', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'manual', attempt_count: 0 });
    jobs.markRunning(job.job_id);
    expect(() =>
      db.prepare("UPDATE collection_jobs SET status = 'scheduled' WHERE job_id = ?").run(job.job_id),
    ).toThrow('invalid job status transition');
  });

  it('closes a scheduled job directly as failed', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    const failed = jobs.markFailed(job.job_id, { error: 'Superseded by a newer job', error_kind: 'superseded' });
    expect(failed.status).toBe('failed');
    expect(failed.error_kind).toBe('superseded');
  });

  it('tracks pending retries until a follow-up job exists', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    jobs.markRunning(job.job_id);
    jobs.markFailed(job.job_id, {
      error: 'upstream 503',
      error_kind: 'transient',
      next_retry_at: '2030-01-01T00:00:05.000Z',
      retry_attempt: 1,
    });

    const pending = jobs.findPendingRetries('dane_ipc');
    expect(pending.map((j) => j.job_id)).toEqual([job.job_id]);
    expect(pending[0]?.retry_attempt).toBe(1);
    expect(jobs.findPendingRetries('el_tiempo')).toEqual([]);

    jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'retry', attempt_count: 1, parent_job_id: job.job_id });
    expect(jobs.findPendingRetries()).toEqual([]);
  });

  it('clears a pending retry', () => {
    const job = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    jobs.markFailed(job.job_id, {
      error: 'upstream 503',
      error_kind: 'transient',
      next_retry_at: '2030-01-01T00:00:05.000Z',
      retry_attempt: 1,
    });
    jobs.clearPendingRetry(job.job_id);
    expect(jobs.findPendingRetries()).toEqual([]);
    expect(jobs.getJob(job.job_id)?.retry_attempt).toBeNull();
  });

  it('finds stale scheduled and running jobs as orphans', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const stale = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    const staleRunning = jobs.createJob({ source_key: 'el_tiempo', trigger_kind: 'interval', attempt_count: 0 });
    jobs.markRunning(staleRunning.job_id);

    vi.setSystemTime(new Date('2026-01-01T00:10:00.000Z'));
    const fresh = jobs.createJob({ source_key: 'banrep_tasas', trigger_kind: 'interval', attempt_count: 0 });
    jobs.markRunning(fresh.job_id);

    const orphans = jobs.findOrphans('2026-01-01T00:05:00.000Z');
    expect(orphans.map((j) => j.job_id).sort()).toEqual([stale.job_id, staleRunning.job_id].sort());

    expect(jobs.findOrphans('2026-01-01T00:05:00.000Z', [stale.job_id]).map((j) => j.job_id)).toEqual([
      staleRunning.job_id,
    ]);
  });

  it('prunes finished jobs children first', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    const parent = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    jobs.markRunning(parent.job_id);
    jobs.markFailed(parent.job_id, { error: 'upstream 503', error_kind: 'transient' });
    const child = jobs.createJob({
      source_key: 'dane_ipc',
      trigger_kind: 'retry',
      attempt_count: 1,
      parent_job_id: parent.job_id,
    });
    jobs.markRunning(child.job_id);
    jobs.markSucceeded(child.job_id, { items_fetched: 1, items_stored: 1, items_duplicate: 0, item_errors: 0 });

    vi.setSystemTime(new Date('2024-06-01T00:00:00.000Z'));
    const recent = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'manual', attempt_count: 0 });
    jobs.markRunning(recent.job_id);
    jobs.markSucceeded(recent.job_id, { items_fetched: 0, items_stored: 0, items_duplicate: 0, item_errors: 0 });

    expect(jobs.pruneFinished('2024-03-01T00:00:00.000Z')).toBe(2);
    expect(jobs.listJobs().map((j) => j.job_id)).toEqual([recent.job_id]);
  });

  it('filters and counts jobs', () => {
    const a = jobs.createJob({ source_key: 'dane_ipc', trigger_kind: 'interval', attempt_count: 0 });
    jobs.createJob({ source_key: 'el_tiempo', trigger_kind: 'interval', attempt_count: 0 });
    jobs.markRunning(a.job_id);

    expect(jobs.listJobs({ source_key: 'el_tiempo' })).toHaveLength(1);
    expect(jobs.listJobs({ status: 'running' }).map((j) => j.job_id)).toEqual([a.job_id]);
    expect(jobs.countByStatus()).toEqual({ scheduled: 1, running: 1, succeeded: 0, failed: 0, 'dead-lettered': 0 });
  });

  describe('source state', () => {
    it('returns defaults for an unseen source', () => {
      expect(jobs.getSourceState('dane_ipc')).toEqual({
        source_key: 'dane_ipc',
        paused: 0,
        consecutive_failures: 0,
        last_run_at: null,
        last_success_at: null,
        next_run_at: null,
        last_error: null,
      });
    });

    it('counts failure streaks, except capacity failures', () => {
      jobs.recordFailure('dane_ipc', 'upstream 503', true);
      jobs.recordFailure('dane_ipc', 'rate limited', false);
      let state = jobs.getSourceState('dane_ipc');
      expect(state.consecutive_failures).toBe(1);
      expect(state.last_error).toBe('rate limited');

      jobs.recordSuccess('dane_ipc');
      state = jobs.getSourceState('dane_ipc');
      expect(state.consecutive_failures).toBe(0);
      expect(state.last_error).toBeNull();
      expect(state.last_success_at).not.toBeNull();
    });

    it('persists the paused flag', () => {
      jobs.setPaused('dane_ipc', true);
      expect(jobs.isPaused('dane_ipc')).toBe(true);
      expect(new JobStore(db).isPaused('dane_ipc')).toBe(true);
      jobs.setPaused('dane_ipc', false);
      expect(jobs.isPaused('dane_ipc')).toBe(false);
    });
  });

  it('reports a closed database as fatal', () => {
    db.close();
    expect(() => jobs.ping()).toThrow(FatalError);
  });
});
