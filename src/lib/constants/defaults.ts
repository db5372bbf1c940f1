/**
 * Default timings shared by the ACME client, the DNS provider gateway and the
 * challenge orchestrator. Every value can be overridden through options.
 */

// Order polling (finalize -> valid)
export const ORDER_POLL_MAX_ATTEMPTS = 60;
export const ORDER_POLL_INTERVAL_MS = 5_000;

// Authorization polling after a challenge was answered
export const AUTHORIZATION_POLL_MAX_ATTEMPTS = 20;
export const AUTHORIZATION_POLL_INTERVAL_MS = 2_000;
export const AUTHORIZATION_POLL_BACKOFF_FACTOR = 1.5;
export const AUTHORIZATION_POLL_MAX_INTERVAL_MS = 15_000;

// DNS provider retry policy (4 attempts in total)
export const PROVIDER_MAX_RETRIES = 3;
export const PROVIDER_RETRY_BASE_DELAY_MS = 500;
export const PROVIDER_RETRY_MAX_DELAY_MS = 10_000;

// Propagation checks
export const PROPAGATION_POLL_INTERVAL_MS = 5_000;
export const PUBLIC_RESOLVERS = ['1.1.1.1', '8.8.8.8'] as const;
/** Per query, before the resolver moves on or gives up */
export const RESOLVER_TIMEOUT_MS = 2_000;
export const RESOLVER_TRIES = 2;

// Challenge records
export const CHALLENGE_RECORD_PREFIX = '_acme-challenge';
export const DEFAULT_RECORD_TTL = 60;
