/**
 * ACME Status Types and Constants
 *
 * Runtime constants with derived union types, so status comparisons are both
 * checked at compile time and usable as values.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.6
 */

/**
 * Order status transitions:
 * pending -> ready -> processing -> valid
 *            |-> invalid (on error or expiration)
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  READY: 'ready',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeOrderStatus = (typeof ORDER_STATUS)[keyof typeof ORDER_STATUS];

/**
 * Authorization status transitions:
 * pending -> (valid|invalid) -> (expired|deactivated|revoked)
 */
export const AUTHORIZATION_STATUS = {
  PENDING: 'pending',
  VALID: 'valid',
  INVALID: 'invalid',
  DEACTIVATED: 'deactivated',
  EXPIRED: 'expired',
  REVOKED: 'revoked',
} as const;

export type AcmeAuthorizationStatus =
  (typeof AUTHORIZATION_STATUS)[keyof typeof AUTHORIZATION_STATUS];

export const CHALLENGE_STATUS = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeChallengeStatus = (typeof CHALLENGE_STATUS)[keyof typeof CHALLENGE_STATUS];

export const CHALLENGE_TYPE = {
  DNS_01: 'dns-01',
} as const;

const ORDER_STATUSES: readonly string[] = Object.values(ORDER_STATUS);
const AUTHORIZATION_STATUSES: readonly string[] = Object.values(AUTHORIZATION_STATUS);
const CHALLENGE_STATUSES: readonly string[] = Object.values(CHALLENGE_STATUS);

export function isAcmeOrderStatus(value: unknown): value is AcmeOrderStatus {
  return typeof value === 'string' && ORDER_STATUSES.includes(value);
}

export function isAcmeAuthorizationStatus(value: unknown): value is AcmeAuthorizationStatus {
  return typeof value === 'string' && AUTHORIZATION_STATUSES.includes(value);
}

export function isAcmeChallengeStatus(value: unknown): value is AcmeChallengeStatus {
  return typeof value === 'string' && CHALLENGE_STATUSES.includes(value);
}
