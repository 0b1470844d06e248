import logger from './logger.js';
import { TimeoutError, describeError, propertyOf, statusCodeOf } from './errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs?: number;
  /** Exponential backoff factor (default: 2) */
  backoffFactor?: number;
  /** Decides whether an error is worth another attempt (default: isTransientError) */
  isRetryable?: (error: unknown) => boolean;
  /** Operation name for logging */
  operationName?: string;
}

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET'];

/**
 * Server errors, rate limiting, timeouts and dropped connections are transient.
 * Client errors (403 from a missing RBAC verb, 404, 422) are not.
 */
export function isTransientError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  if (error instanceof TimeoutError) {
    return true;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    return statusCode >= 500 || statusCode === 429;
  }

  const code = propertyOf(error, 'code');
  if (typeof code === 'string' && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }

  // fetch wraps socket failures: TypeError('fetch failed') with the system error as cause
  const cause = propertyOf(error, 'cause');
  if (cause && cause !== error && isTransientError(cause)) {
    return true;
  }

  const message = propertyOf(error, 'message');
  const text = typeof message === 'string' ? message : '';
  return ['socket hang up', 'network error', 'fetch failed'].some((fragment) => text.includes(fragment));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async function with retry logic and exponential backoff.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 2,
    initialDelayMs = 500,
    maxDelayMs = 5000,
    backoffFactor = 2,
    isRetryable = isTransientError,
    operationName = 'operation',
  } = options;

  let delay = initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryable(error)) {
        throw error;
      }

      logger.warn(
        {
          operationName,
          attempt: attempt + 1,
          maxRetries,
          delayMs: delay,
          statusCode: statusCodeOf(error),
          errorMessage: describeError(error),
        },
        `Retrying ${operationName} after transient error (attempt ${attempt + 1}/${maxRetries})`
      );

      await sleep(delay);
      delay = Math.min(delay * backoffFactor, maxDelayMs);
    }
  }
}

/**
 * Race a call against a deadline. The call itself is abandoned, not cancelled,
 * so its eventual result is dropped.
 */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
  });

  const call = fn();
  // keep a late rejection of the abandoned call from surfacing as unhandled
  call.catch(() => undefined);

  try {
    return await Promise.race([call, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
