export class TidewatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TidewatchError';
  }
}

export class ConfigError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SourceError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class LlmError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class EnrichmentError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ENRICHMENT_ERROR', details);
    this.name = 'EnrichmentError';
  }
}

export class JobConflictError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JOB_CONFLICT', details);
    this.name = 'JobConflictError';
  }
}

export class JobStateError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JOB_STATE_ERROR', details);
    this.name = 'JobStateError';
  }
}

// ================================================================
// Collection failure taxonomy
// ================================================================

/** Network failure, 5xx or timeout. Retried with backoff. */
export class TransientError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSIENT_ERROR', details);
    this.name = 'TransientError';
  }
}

/** Malformed upstream data. Recurs deterministically, never retried. */
export class ValidationError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/** Rate limit or backpressure. Requeued without spending a retry. */
export class CapacityError extends TidewatchError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    public readonly retryAfterMs?: number,
  ) {
    super(message, 'CAPACITY_ERROR', details);
    this.name = 'CapacityError';
  }
}

/** Persistence store unavailable. Halts scheduling until it comes back. */
export class FatalError extends TidewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FATAL_ERROR', details);
    this.name = 'FatalError';
  }
}

export type FailureReason = 'transient' | 'validation' | 'capacity' | 'fatal';

/**
 * Map any thrown value onto the failure taxonomy.
 * Unknown errors count as transient: the retry budget bounds them.
 */
export function classifyError(err: unknown): FailureReason {
  if (err instanceof FatalError) return 'fatal';
  if (err instanceof CapacityError) return 'capacity';
  if (err instanceof ValidationError || err instanceof ConfigError) return 'validation';
  return 'transient';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
