/**
 * ACME Error Codes (RFC 8555 Section 6.7)
 *
 * Problem document `type` URNs returned by ACME servers.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-6.7 | RFC 8555 Section 6.7 - Errors}
 */

const prefix = 'urn:ietf:params:acme:error:';

export const ACME_ERROR = {
  accountDoesNotExist: `${prefix}accountDoesNotExist`,
  badCSR: `${prefix}badCSR`,
  /** The client sent an unacceptable anti-replay nonce; retry with a fresh one */
  badNonce: `${prefix}badNonce`,
  caa: `${prefix}caa`,
  /** Multiple errors occurred; see `subproblems` */
  compound: `${prefix}compound`,
  connection: `${prefix}connection`,
  /** DNS lookup of a DNS-01 record failed on the server side */
  dns: `${prefix}dns`,
  /** The TXT value found did not match the key authorization digest */
  incorrectResponse: `${prefix}incorrectResponse`,
  invalidContact: `${prefix}invalidContact`,
  malformed: `${prefix}malformed`,
  orderNotReady: `${prefix}orderNotReady`,
  rateLimited: `${prefix}rateLimited`,
  rejectedIdentifier: `${prefix}rejectedIdentifier`,
  serverInternal: `${prefix}serverInternal`,
  unauthorized: `${prefix}unauthorized`,
  unsupportedIdentifier: `${prefix}unsupportedIdentifier`,
} as const;

export type AcmeErrorType = (typeof ACME_ERROR)[keyof typeof ACME_ERROR];
