/**
 * ACME Request Signer
 *
 * Handles JWS-authenticated requests to ACME servers with nonce management
 * and algorithm detection per RFC 8555 Section 6.2.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
 * @see https://datatracker.ietf.org/doc/html/rfc7515
 */

import * as jose from 'jose';

import type { AcmeClient } from './acme-client.js';
import type { NonceManager } from '../managers/nonce-manager.js';
import type { AcmeDirectory } from '../types/directory.js';
import type { ParsedResponseData } from '../transport/http-client.js';

/**
 * Keys bound to a single ACME account
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-11.1
 */
export interface AccountKeys {
  privateKey: CryptoKey;
  publicKey: CryptoKey;
}

/**
 * Detect the JWS algorithm matching a WebCrypto public key
 */
export async function detectJwsAlgorithm(publicKey: CryptoKey): Promise<string> {
  const jwk = await jose.exportJWK(publicKey);

  if (jwk.kty === 'EC') {
    switch (jwk.crv) {
      case 'P-256':
        return 'ES256';
      case 'P-384':
        return 'ES384';
      case 'P-521':
        return 'ES512';
      default:
        throw new Error(`Unsupported EC curve: ${jwk.crv}`);
    }
  }

  if (jwk.kty === 'RSA') {
    return 'RS256';
  }

  throw new Error(`Unsupported key type: ${jwk.kty}`);
}

export class AcmeRequestSigner {
  public readonly keys: AccountKeys;
  /** Account URL; empty until the account is registered */
  public kid: string;

  private readonly client: AcmeClient;
  private nonce: NonceManager | null = null;
  private jwsAlgorithm: string | null = null;

  constructor(client: AcmeClient, keys: AccountKeys, opts: { kid?: string } = {}) {
    this.client = client;
    this.keys = keys;
    this.kid = opts.kid ?? '';
  }

  getDirectory(): Promise<AcmeDirectory> {
    return this.client.getDirectory();
  }

  /**
   * Signed POST with badNonce retry
   *
   * @param payload - Request payload, `null` for POST-as-GET
   * @param forceJwk - Embed the public key instead of the account URL (newAccount)
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
   */
  async signedPost(
    url: string,
    payload: Record<string, unknown> | null,
    forceJwk = false,
  ): Promise<ParsedResponseData> {
    const nonceManager = await this.ensureNonceManager();
    const alg = await this.getAlgorithm();

    return nonceManager.withNonceRetry(async (nonce) => {
      const protectedHeader: jose.JWSHeaderParameters = { alg, nonce, url };

      if (forceJwk || !this.kid) {
        protectedHeader.jwk = await jose.exportJWK(this.keys.publicKey);
      } else {
        protectedHeader.kid = this.kid;
      }

      const encodedPayload =
        payload === null ? new Uint8Array(0) : new TextEncoder().encode(JSON.stringify(payload));

      const jws = await new jose.FlattenedSign(encodedPayload)
        .setProtectedHeader(protectedHeader)
        .sign(this.keys.privateKey);

      return this.client.getHttp().post(url, jws, {
        headers: { 'Content-Type': 'application/jose+json' },
      });
    });
  }

  /**
   * Key authorization: token || '.' || base64url(JWK_Thumbprint(accountKey))
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.1
   */
  async keyAuthorization(token: string): Promise<string> {
    const jwk = await jose.exportJWK(this.keys.publicKey);
    const thumbprint = await jose.calculateJwkThumbprint(jwk, 'sha256');
    return `${token}.${thumbprint}`;
  }

  private async ensureNonceManager(): Promise<NonceManager> {
    if (!this.nonce) {
      this.nonce = await this.client.createNonceManager();
    }
    return this.nonce;
  }

  private async getAlgorithm(): Promise<string> {
    if (!this.jwsAlgorithm) {
      this.jwsAlgorithm = await detectJwsAlgorithm(this.keys.publicKey);
    }
    return this.jwsAlgorithm;
  }
}
