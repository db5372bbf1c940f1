/**
 * Errors raised while orchestrating DNS-01 challenges
 *
 * Every error carries a stable `code`, a `type` naming the stage that failed and
 * a `context` record with the values needed to diagnose it. Provider errors are
 * split by how the caller must react: authentication failures are fatal, rate
 * limits and transient failures are retried, a missing record is success for a
 * delete.
 */
import type { ProvisionedRecord } from '../orchestrator/types.js';
import { describeError } from '../utils/logger.js';

export abstract class OrchestrationError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class InvalidDomainFormatError extends OrchestrationError {
  readonly code = 'INVALID_DOMAIN_FORMAT';
  readonly type = 'mapping';

  constructor(
    readonly domain: string,
    readonly reason: string,
  ) {
    super(`Invalid domain "${domain}": ${reason}`, { domain, reason });
  }

  static empty(): InvalidDomainFormatError {
    return new InvalidDomainFormatError('', 'domain name is empty');
  }

  static invalidLabel(domain: string, label: string): InvalidDomainFormatError {
    return new InvalidDomainFormatError(
      domain,
      `label "${label}" must be 1-63 characters of [a-z0-9-] without a leading or trailing hyphen`,
    );
  }

  static misplacedWildcard(domain: string): InvalidDomainFormatError {
    return new InvalidDomainFormatError(domain, 'a wildcard is only allowed as a single leading "*." label');
  }

  static singleLabel(domain: string): InvalidDomainFormatError {
    return new InvalidDomainFormatError(domain, 'at least two labels are required');
  }

  static tooLong(domain: string): InvalidDomainFormatError {
    return new InvalidDomainFormatError(domain, 'name exceeds 253 characters');
  }
}

/**
 * Base of the errors surfaced by the DNS provider gateway
 */
export abstract class ProviderError extends OrchestrationError {
  readonly type = 'provider';
}

/** Credentials rejected (HTTP 401/403). Never retried. */
export class AuthenticationError extends ProviderError {
  readonly code = 'AUTHENTICATION_ERROR';

  constructor(
    message: string,
    readonly statusCode: number,
    context?: Record<string, unknown>,
  ) {
    super(message, { ...context, statusCode });
  }
}

export class ProviderRateLimitedError extends ProviderError {
  readonly code = 'RATE_LIMITED';

  constructor(
    message: string,
    readonly retryAfterMs: number | null = null,
    context?: Record<string, unknown>,
  ) {
    super(message, { ...context, retryAfterMs });
  }
}

/** 5xx answers, timeouts and network failures */
export class TransientProviderError extends ProviderError {
  readonly code = 'TRANSIENT_PROVIDER_ERROR';

  constructor(
    message: string,
    readonly statusCode?: number,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, { ...context, statusCode }, options);
  }
}

export class RecordNotFoundError extends ProviderError {
  readonly code = 'NOT_FOUND';
}

/** Any other rejected request (4xx); not retried */
export class ProviderRequestError extends ProviderError {
  readonly code = 'PROVIDER_REQUEST_FAILED';

  constructor(
    message: string,
    readonly statusCode: number,
    context?: Record<string, unknown>,
  ) {
    super(message, { ...context, statusCode });
  }
}

/** Retries exhausted; `cause` holds the last provider error */
export class ProviderUnavailableError extends ProviderError {
  readonly code = 'PROVIDER_UNAVAILABLE';

  constructor(
    readonly operation: string,
    readonly attempts: number,
    lastError: unknown,
  ) {
    super(
      `DNS provider unavailable during ${operation} after ${attempts} attempt(s): ${
        describeError(lastError)
      }`,
      { operation, attempts },
      { cause: lastError },
    );
  }
}

export class PropagationCheckUnavailableError extends OrchestrationError {
  readonly code = 'PROPAGATION_CHECK_UNAVAILABLE';
  readonly type = 'propagation';

  constructor(
    readonly recordName: string,
    readonly attempts: number,
    lastError: unknown,
  ) {
    super(
      `No DNS lookup for ${recordName} succeeded in ${attempts} attempt(s)`,
      { recordName, attempts },
      { cause: lastError },
    );
  }
}

/** Raised only under the `abort` propagation timeout policy */
export class PropagationTimeoutError extends OrchestrationError {
  readonly code = 'PROPAGATION_TIMEOUT';
  readonly type = 'propagation';

  constructor(
    readonly recordName: string,
    readonly timeoutMs: number,
  ) {
    super(`${recordName} was not visible on public resolvers within ${timeoutMs}ms`, {
      recordName,
      timeoutMs,
    });
  }
}

export interface ValidationFailure {
  domain: string;
  reason: string;
}

export class ChallengeValidationFailedError extends OrchestrationError {
  readonly code = 'CHALLENGE_VALIDATION_FAILED';
  readonly type = 'validation';

  constructor(readonly failures: ValidationFailure[]) {
    super(
      `Challenge validation failed for ${failures
        .map((f) => `${f.domain} (${f.reason})`)
        .join(', ')}`,
      { failures },
    );
  }
}

export class CleanupIncompleteError extends OrchestrationError {
  readonly code = 'CLEANUP_INCOMPLETE';
  readonly type = 'cleanup';

  constructor(
    readonly leftover: ProvisionedRecord[],
    readonly errors: unknown[],
  ) {
    super(
      `${leftover.length} challenge record(s) could not be removed: ${leftover
        .map((r) => r.recordName)
        .join(', ')}`,
      { leftover: leftover.map((r) => ({ recordName: r.recordName, recordId: r.recordId })) },
    );
  }
}

export class RunAbortedError extends OrchestrationError {
  readonly code = 'RUN_ABORTED';
  readonly type = 'run';

  constructor(
    readonly state: string,
    reason?: unknown,
  ) {
    super(`Run aborted during ${state}`, { state }, { cause: reason });
  }
}

export class ConfigError extends OrchestrationError {
  readonly code = 'CONFIG_ERROR';
  readonly type = 'config';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, { issues });
  }

  static unreadable(path: string, cause: unknown): ConfigError {
    return new ConfigError([
      `cannot read ${path}: ${describeError(cause)}`,
    ]);
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/** Rate limits and transient failures are the only retryable provider errors */
export function isRetryableProviderError(
  error: unknown,
): error is ProviderRateLimitedError | TransientProviderError {
  return error instanceof ProviderRateLimitedError || error instanceof TransientProviderError;
}
