import { JobStateError } from '../shared/errors.js';
import type { FailureReason } from '../shared/errors.js';

export type JobStatus = 'scheduled' | 'running' | 'succeeded' | 'failed' | 'dead-lettered';
export type TriggerKind = 'interval' | 'manual' | 'retry' | 'recovery';

/**
 * Forward-only job lifecycle. A scheduled job may be closed as failed
 * without running (superseded or interrupted before start).
 */
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  scheduled: ['running', 'failed'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: ['dead-lettered'],
  'dead-lettered': [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new JobStateError(`Job ${jobId} cannot move from ${from} to ${to}`, { job_id: jobId, from, to });
  }
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export type NextStep =
  | { action: 'retry'; attempt: number }
  | { action: 'requeue'; attempt: number }
  | { action: 'dead-letter' }
  | { action: 'halt' };

/**
 * What happens after a failed attempt. `attempt` is the zero-based attempt
 * that just failed; with `maxRetries = N` attempts 0..N run before the job
 * is dead-lettered.
 */
export function nextStep(reason: FailureReason, attempt: number, maxRetries: number): NextStep {
  switch (reason) {
    case 'fatal':
      return { action: 'halt' };
    case 'validation':
      return { action: 'dead-letter' };
    case 'capacity':
      return { action: 'requeue', attempt };
    case 'transient':
      return attempt < maxRetries ? { action: 'retry', attempt: attempt + 1 } : { action: 'dead-letter' };
  }
}
