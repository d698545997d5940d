import { describe, it, expect } from 'vitest';
import {
  CapacityError,
  ConfigError,
  FatalError,
  SourceError,
  TransientError,
  ValidationError,
  classifyError,
  errorMessage,
} from '../errors.js';

describe('classifyError', () => {
  it('maps the taxonomy onto failure reasons', () => {
    expect(classifyError(new TransientError('timeout'))).toBe('transient');
    expect(classifyError(new ValidationError('bad json'))).toBe('validation');
    expect(classifyError(new ConfigError('kind mismatch'))).toBe('validation');
    expect(classifyError(new CapacityError('rate limited', {}, 1000))).toBe('capacity');
    expect(classifyError(new FatalError('store down'))).toBe('fatal');
  });

  it('treats unknown errors as transient', () => {
    expect(classifyError(new Error('boom'))).toBe('transient');
    expect(classifyError(new SourceError('Unknown source: x'))).toBe('transient');
    expect(classifyError('a string')).toBe('transient');
  });
});

describe('errors', () => {
  it('carries code, details and retry hint', () => {
    const err = new CapacityError('Rate limited', { source: 'dane_ipc' }, 30_000);
    expect(err.code).toBe('CAPACITY_ERROR');
    expect(err.name).toBe('CapacityError');
    expect(err.details).toEqual({ source: 'dane_ipc' });
    expect(err.retryAfterMs).toBe(30_000);
  });

  it('renders messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
