import { describe, it, expect } from 'vitest';
import { ConfigError, FetchError, ReconcileError, describeError, isNotFound, statusCodeOf } from './errors.js';

describe('statusCodeOf', () => {
  it('reads the status from the shapes API clients throw', () => {
    expect(statusCodeOf({ code: 404 })).toBe(404);
    expect(statusCodeOf({ statusCode: 409 })).toBe(409);
    expect(statusCodeOf({ response: { statusCode: 500 } })).toBe(500);
    expect(statusCodeOf({ response: { status: 429 } })).toBe(429);
    expect(statusCodeOf(new FetchError('HTTP 503', { statusCode: 503 }))).toBe(503);
  });

  it('ignores values that are not HTTP statuses', () => {
    expect(statusCodeOf({ code: 'ECONNRESET' })).toBeUndefined();
    expect(statusCodeOf({ code: 42 })).toBeUndefined();
    expect(statusCodeOf(new Error('plain'))).toBeUndefined();
    expect(statusCodeOf(undefined)).toBeUndefined();
  });
});

describe('isNotFound', () => {
  it('is true only for 404', () => {
    expect(isNotFound({ code: 404 })).toBe(true);
    expect(isNotFound({ code: 403 })).toBe(false);
  });
});

describe('error classes', () => {
  it('keeps the cause and a stable code', () => {
    const cause = Object.assign(new Error('forbidden'), { code: 403 });
    const error = new ReconcileError('pool-a', 'patch', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('RECONCILE_FAILED');
    expect(error.meta).toEqual({ pool: 'pool-a', operation: 'patch', statusCode: 403 });
    expect(error.toJSON()).toEqual({
      name: 'ReconcileError',
      code: 'RECONCILE_FAILED',
      message: 'Failed to patch placeholder deployment for pool pool-a: forbidden',
      meta: { pool: 'pool-a', operation: 'patch', statusCode: 403 },
    });
  });

  it('lists every configuration issue', () => {
    const error = new ConfigError(['calendarUrl: calendarUrl is required', 'nodePools: nodePools is required']);
    expect(error.message).toBe(
      'Invalid configuration: calendarUrl: calendarUrl is required; nodePools: nodePools is required'
    );
    expect(error).toBeInstanceOf(Error);
  });

  it('describes non-Error values', () => {
    expect(describeError('boom')).toBe('boom');
    expect(describeError(new FetchError('HTTP 500'))).toBe('Calendar fetch failed: HTTP 500');
  });
});
