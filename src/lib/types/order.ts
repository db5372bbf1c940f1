/**
 * RFC 8555 order, authorization and challenge objects
 *
 * The `parse…` helpers check the fields the client relies on before a server
 * response is used as one of these objects.
 */

import {
  isAcmeAuthorizationStatus,
  isAcmeChallengeStatus,
  isAcmeOrderStatus,
  type AcmeAuthorizationStatus,
  type AcmeChallengeStatus,
  type AcmeOrderStatus,
} from './status.js';
import type { AcmeDirectory } from './directory.js';

export type {
  AcmeOrderStatus,
  AcmeAuthorizationStatus,
  AcmeChallengeStatus,
} from './status.js';

export interface AcmeIdentifier {
  type: string;
  value: string;
}

export interface AcmeChallenge {
  /** Challenge type; kept as a string since servers may offer types this client ignores */
  type: string;
  url: string;
  status: AcmeChallengeStatus;
  token: string;
  validated?: string;
  /** Problem document when validation failed */
  error?: unknown;
}

export interface AcmeAuthorization {
  identifier: AcmeIdentifier;
  status: AcmeAuthorizationStatus;
  expires?: string;
  challenges: AcmeChallenge[];
  wildcard?: boolean;
}

export interface AcmeOrder {
  status: AcmeOrderStatus;
  expires?: string;
  identifiers: AcmeIdentifier[];
  authorizations: string[];
  finalize: string;
  certificate?: string;
  /** Order URL, taken from the Location header */
  url: string;
  error?: unknown;
}

export class MalformedResponseError extends Error {
  constructor(what: string, body: unknown) {
    super(`Malformed ${what} in ACME response: ${JSON.stringify(body)}`);
    this.name = 'MalformedResponseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseIdentifier(value: unknown): AcmeIdentifier {
  if (!isRecord(value) || typeof value.type !== 'string' || typeof value.value !== 'string') {
    throw new MalformedResponseError('identifier', value);
  }
  return { type: value.type, value: value.value };
}

export function parseDirectory(body: unknown): AcmeDirectory {
  if (
    !isRecord(body) ||
    typeof body.newNonce !== 'string' ||
    typeof body.newAccount !== 'string' ||
    typeof body.newOrder !== 'string'
  ) {
    throw new MalformedResponseError('directory', body);
  }

  const directory: AcmeDirectory = {
    newNonce: body.newNonce,
    newAccount: body.newAccount,
    newOrder: body.newOrder,
  };
  const revokeCert = optionalString(body.revokeCert);
  const keyChange = optionalString(body.keyChange);
  if (revokeCert) directory.revokeCert = revokeCert;
  if (keyChange) directory.keyChange = keyChange;

  if (isRecord(body.meta)) {
    const { meta } = body;
    directory.meta = {};
    const termsOfService = optionalString(meta.termsOfService);
    const website = optionalString(meta.website);
    if (termsOfService) directory.meta.termsOfService = termsOfService;
    if (website) directory.meta.website = website;
    if (isStringArray(meta.caaIdentities)) directory.meta.caaIdentities = meta.caaIdentities;
    if (typeof meta.externalAccountRequired === 'boolean') {
      directory.meta.externalAccountRequired = meta.externalAccountRequired;
    }
  }

  return directory;
}

export function parseChallenge(body: unknown): AcmeChallenge {
  if (
    !isRecord(body) ||
    typeof body.type !== 'string' ||
    typeof body.url !== 'string' ||
    !isAcmeChallengeStatus(body.status)
  ) {
    throw new MalformedResponseError('challenge', body);
  }

  const challenge: AcmeChallenge = {
    type: body.type,
    url: body.url,
    status: body.status,
    token: optionalString(body.token) ?? '',
  };
  const validated = optionalString(body.validated);
  if (validated) challenge.validated = validated;
  if (body.error !== undefined) challenge.error = body.error;

  return challenge;
}

export function parseAuthorization(body: unknown): AcmeAuthorization {
  if (!isRecord(body) || !isAcmeAuthorizationStatus(body.status) || !Array.isArray(body.challenges)) {
    throw new MalformedResponseError('authorization', body);
  }

  const authorization: AcmeAuthorization = {
    identifier: parseIdentifier(body.identifier),
    status: body.status,
    challenges: body.challenges.map(parseChallenge),
  };
  const expires = optionalString(body.expires);
  if (expires) authorization.expires = expires;
  if (typeof body.wildcard === 'boolean') authorization.wildcard = body.wildcard;

  return authorization;
}

export function parseOrder(body: unknown, url: string): AcmeOrder {
  if (
    !isRecord(body) ||
    !isAcmeOrderStatus(body.status) ||
    !Array.isArray(body.identifiers) ||
    !isStringArray(body.authorizations) ||
    typeof body.finalize !== 'string'
  ) {
    throw new MalformedResponseError('order', body);
  }

  const order: AcmeOrder = {
    status: body.status,
    identifiers: body.identifiers.map(parseIdentifier),
    authorizations: body.authorizations,
    finalize: body.finalize,
    url,
  };
  const expires = optionalString(body.expires);
  const certificate = optionalString(body.certificate);
  if (expires) order.expires = expires;
  if (certificate) order.certificate = certificate;
  if (body.error !== undefined) order.error = body.error;

  return order;
}
