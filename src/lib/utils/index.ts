export {
  withRetry,
  pollUntil,
  pollDelay,
  sleep,
  isRetryableError,
  isNetworkError,
  getRetryAfterMs,
  calculateRetryDelay,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type RetryOptions,
  type PollPolicy,
  type PollOptions,
  type PollResult,
} from './retry.js';
export { createDebugLogger, silentLogger, describeError, isErrorLike, type Logger } from './logger.js';
export { buildUserAgent, getPackageInfo, type PackageInfo } from './user-agent.js';
