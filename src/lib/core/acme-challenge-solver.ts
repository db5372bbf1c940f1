/**
 * ACME Challenge Solver
 *
 * Authorization retrieval and DNS-01 challenge handling per RFC 8555
 * Sections 7.5 and 8.4. Publishing the TXT record is left to the caller.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.4
 */

import { createHash } from 'node:crypto';

import {
  parseAuthorization,
  parseChallenge,
  type AcmeAuthorization,
  type AcmeChallenge,
} from '../types/order.js';
import { CHALLENGE_STATUS, CHALLENGE_TYPE } from '../types/status.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { ChallengeError } from '../errors/acme-errors.js';
import { debugAcme } from '../utils/debug.js';
import type { AcmeRequestSigner } from './acme-request-signer.js';

/** What has to be published to satisfy one DNS-01 challenge */
export interface Dns01Preparation {
  /** Identifier as ordered: `*.example.com` for wildcard authorizations */
  domain: string;
  challenge: AcmeChallenge;
  keyAuthorization: string;
  /** base64url(SHA-256(keyAuthorization)) */
  recordValue: string;
}

/**
 * TXT record value for a key authorization
 */
export function dns01RecordValue(keyAuthorization: string): string {
  return createHash('sha256').update(keyAuthorization).digest('base64url');
}

/**
 * Name an authorization was ordered under; wildcard authorizations carry the
 * base name plus `wildcard: true`
 */
export function authorizationDomain(authorization: AcmeAuthorization): string {
  const { value } = authorization.identifier;
  return authorization.wildcard ? `*.${value}` : value;
}

/**
 * Server-side reason an authorization failed, from its challenge errors
 */
export function authorizationFailureReason(authorization: AcmeAuthorization): string {
  const reasons: string[] = [];
  for (const challenge of authorization.challenges) {
    if (challenge.error !== undefined && challenge.status !== CHALLENGE_STATUS.VALID) {
      const problem = createErrorFromProblem(challenge.error);
      debugAcme('challenge error type=%s detail=%s', problem.type, problem.detail);
      reasons.push(problem.describe());
    }
  }
  return reasons.length ? reasons.join('; ') : `authorization ${authorization.status}`;
}

export class AcmeChallengeSolver {
  constructor(private readonly signer: AcmeRequestSigner) {}

  async getAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    const response = await this.signer.signedPost(authzUrl, null);

    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }

    return parseAuthorization(response.body);
  }

  /**
   * Tell the server the challenge response is in place
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.5.1
   */
  async acceptChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    const response = await this.signer.signedPost(challengeUrl, {});

    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }

    return parseChallenge(response.body);
  }

  /**
   * Key authorization and TXT value for the DNS-01 challenge of an authorization
   *
   * @throws {ChallengeError} When the server offers no DNS-01 challenge
   */
  async prepareDns01(authorization: AcmeAuthorization): Promise<Dns01Preparation> {
    const domain = authorizationDomain(authorization);
    const challenge = authorization.challenges.find((ch) => ch.type === CHALLENGE_TYPE.DNS_01);
    if (!challenge) {
      throw ChallengeError.notFound(CHALLENGE_TYPE.DNS_01, domain);
    }

    const keyAuthorization = await this.signer.keyAuthorization(challenge.token);
    return {
      domain,
      challenge,
      keyAuthorization,
      recordValue: dns01RecordValue(keyAuthorization),
    };
  }
}
