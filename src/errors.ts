import type { ReconcileOperation } from './types.js';

/**
 * Context attached to an error for logging.
 */
export interface ErrorMeta {
  [key: string]: unknown;
}

/**
 * Base class for every error the scaler raises on purpose.
 */
export class ScalerError extends Error {
  /** Stable identifier, used as a log field */
  public readonly code: string;
  public readonly meta: ErrorMeta;

  constructor(message: string, code: string, meta: ErrorMeta = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ScalerError';
    this.code = code;
    this.meta = meta;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
    };
  }
}

/**
 * The calendar feed could not be retrieved, or its body is not a calendar at all.
 */
export class FetchError extends ScalerError {
  public readonly reason: string;
  /** HTTP status of the feed response, when there was one */
  public readonly statusCode?: number;

  constructor(reason: string, meta: ErrorMeta = {}, cause?: unknown) {
    super(`Calendar fetch failed: ${reason}`, 'CALENDAR_FETCH_FAILED', meta, cause);
    this.name = 'FetchError';
    this.reason = reason;
    if (typeof meta.statusCode === 'number') {
      this.statusCode = meta.statusCode;
    }
  }
}

/**
 * A single VEVENT was unusable. Never fatal to the feed it came from.
 */
export class ParseError extends ScalerError {
  public readonly uid: string;

  constructor(uid: string, reason: string) {
    super(`Skipping calendar event ${uid}: ${reason}`, 'CALENDAR_EVENT_INVALID', { uid, reason });
    this.name = 'ParseError';
    this.uid = uid;
  }
}

export class ReconcileError extends ScalerError {
  public readonly pool: string;
  public readonly operation: ReconcileOperation;

  constructor(pool: string, operation: ReconcileOperation, cause: unknown) {
    super(
      `Failed to ${operation} placeholder deployment for pool ${pool}: ${describeError(cause)}`,
      'RECONCILE_FAILED',
      { pool, operation, statusCode: statusCodeOf(cause) },
      cause
    );
    this.name = 'ReconcileError';
    this.pool = pool;
    this.operation = operation;
  }
}

export class ConfigError extends ScalerError {
  public readonly issues: string[];

  constructor(issues: string[], cause?: unknown) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID', { issues }, cause);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class TimeoutError extends ScalerError {
  constructor(operationName: string, timeoutMs: number) {
    super(`${operationName} timed out after ${timeoutMs}ms`, 'TIMEOUT', { operationName, timeoutMs });
    this.name = 'TimeoutError';
  }
}

/**
 * Read a property off an unknown thrown value.
 */
export function propertyOf(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

/**
 * Extract an HTTP status from the error shapes the Kubernetes client and fetch produce.
 */
export function statusCodeOf(error: unknown): number | undefined {
  const response = propertyOf(error, 'response');
  const candidates = [
    propertyOf(error, 'code'),
    propertyOf(error, 'statusCode'),
    propertyOf(response, 'statusCode'),
    propertyOf(response, 'status'),
  ];
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && candidate >= 100 && candidate < 600) {
      return candidate;
    }
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return statusCodeOf(error) === 404;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
