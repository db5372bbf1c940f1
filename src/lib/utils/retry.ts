import { debugRetry } from './debug.js';
import { describeError, errorCode } from './logger.js';

/**
 * Retry configuration for provider and ACME requests
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor: number;
  /** Jitter percentage 0-1 (default: 0.1) */
  jitterPercent: number;
  /** Respect Retry-After hints (default: true) */
  respectRetryAfter: boolean;
}

export interface RetryOptions extends Partial<RetryConfig> {
  /** Decides whether a failed attempt may be retried. Defaults to {@link isRetryableError}. */
  shouldRetry?: (error: unknown) => boolean;
  /** Server-provided delay hint for a failed attempt, if any */
  retryAfterMs?: (error: unknown) => number | null;
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  backoffFactor: 2,
  jitterPercent: 0.1,
  respectRetryAfter: true,
};

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export function isNetworkError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && RETRYABLE_ERROR_CODES.has(code);
}

/**
 * Check if an error is retryable: network failures and 408/429/5xx responses
 */
export function isRetryableError(error: unknown): boolean {
  if (isNetworkError(error)) return true;

  if (error && typeof error === 'object' && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number' && RETRYABLE_STATUS_CODES.has(statusCode)) {
      return true;
    }
  }

  return false;
}

/**
 * Extract Retry-After header value in milliseconds
 */
export function getRetryAfterMs(
  headers: Record<string, string | string[] | undefined>,
): number | null {
  const retryAfter = headers['retry-after'];
  if (!retryAfter) return null;

  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!value) return null;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

/**
 * Calculate retry delay with exponential backoff and jitter
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig,
  retryAfterMs?: number | null,
): number {
  if (config.respectRetryAfter && retryAfterMs !== null && retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt);
  const jitter = exponentialDelay * config.jitterPercent * (Math.random() * 2 - 1);

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

/**
 * Sleep for the given milliseconds; rejects with the signal's reason when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry wrapper for async functions.
 * The last error is rethrown once retries are exhausted or a non-retryable error occurs.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
  context = 'operation',
): Promise<T> {
  const { shouldRetry = isRetryableError, retryAfterMs, signal, ...overrides } = options;
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...overrides };
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    signal?.throwIfAborted();

    try {
      const result = await operation(attempt);
      if (attempt > 0) {
        debugRetry('%s succeeded on attempt %d/%d', context, attempt + 1, config.maxRetries + 1);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (attempt === config.maxRetries) break;

      if (!shouldRetry(error)) {
        debugRetry(
          '%s: non-retryable error on attempt %d: %s',
          context,
          attempt + 1,
          describeError(error),
        );
        throw error;
      }

      const delayMs = calculateRetryDelay(attempt, config, retryAfterMs?.(error));
      debugRetry(
        '%s: attempt %d/%d failed, retrying in %dms: %s',
        context,
        attempt + 1,
        config.maxRetries + 1,
        Math.round(delayMs),
        describeError(error),
      );
      await sleep(delayMs, signal);
    }
  }

  debugRetry('%s: all %d attempts failed', context, config.maxRetries + 1);
  throw lastError;
}

/**
 * Bounded polling schedule: attempts are spaced by `intervalMs`, multiplied by
 * `backoffFactor` after every attempt and capped at `maxIntervalMs`.
 */
export interface PollPolicy {
  maxAttempts: number;
  intervalMs: number;
  backoffFactor?: number;
  maxIntervalMs?: number;
}

export interface PollOptions {
  /** Count probe errors as "not done yet" instead of rethrowing them */
  tolerateErrors?: boolean;
  signal?: AbortSignal;
  context?: string;
  /** No attempt starts after this instant (per `now`) */
  deadline?: number;
  now?: () => number;
}

export interface PollResult<T> {
  done: boolean;
  /** Last successfully probed value */
  value?: T;
  attempts: number;
  /** Number of attempts whose probe threw (only with tolerateErrors) */
  failures: number;
  lastError?: unknown;
}

/** Delay before the attempt following `attempt` (0-based) */
export function pollDelay(attempt: number, policy: PollPolicy): number {
  const factor = policy.backoffFactor ?? 1;
  const delay = policy.intervalMs * Math.pow(factor, attempt);
  return policy.maxIntervalMs !== undefined ? Math.min(delay, policy.maxIntervalMs) : delay;
}

/**
 * Repeat `probe` until `isDone` accepts its value, the attempts run out or the
 * deadline passes. Never sleeps after the last attempt nor past the deadline.
 */
export async function pollUntil<T>(
  probe: (attempt: number) => Promise<T>,
  isDone: (value: T) => boolean,
  policy: PollPolicy,
  options: PollOptions = {},
): Promise<PollResult<T>> {
  const { tolerateErrors = false, signal, context = 'poll', deadline, now = Date.now } = options;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const result: PollResult<T> = { done: false, attempts: 0, failures: 0 };

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    signal?.throwIfAborted();
    result.attempts = attempt + 1;

    try {
      const value = await probe(attempt);
      result.value = value;
      if (isDone(value)) {
        result.done = true;
        debugRetry('%s: done after %d attempt(s)', context, result.attempts);
        return result;
      }
    } catch (error) {
      if (!tolerateErrors) throw error;
      result.failures++;
      result.lastError = error;
      debugRetry(
        '%s: attempt %d failed: %s',
        context,
        attempt + 1,
        describeError(error),
      );
    }

    if (attempt >= maxAttempts - 1) break;

    let delayMs = pollDelay(attempt, policy);
    if (deadline !== undefined) {
      const remainingMs = deadline - now();
      if (remainingMs <= 0) break;
      delayMs = Math.min(delayMs, remainingMs);
    }
    await sleep(delayMs, signal);
  }

  debugRetry('%s: gave up after %d attempt(s)', context, result.attempts);
  return result;
}
