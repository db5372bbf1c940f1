import { describe, test, expect, beforeEach } from '@jest/globals';
import * as jose from 'jose';

import {
  AccountError,
  AcmeAccount,
  AcmeClient,
  HttpClient,
  generateAccountKeys,
  type AccountKeys,
  type ParsedResponseData,
} from '../../src/index.js';

const DIRECTORY_URL = 'https://ca.test/directory';
const ACCOUNT_URL = 'https://ca.test/acct/1';

interface SignedRequest {
  url: string;
  header: jose.ProtectedHeaderParameters;
  payload: unknown;
}

function isFlattenedJws(value: unknown): value is jose.FlattenedJWSInput & { protected: string; payload: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'protected' in value &&
    typeof value.protected === 'string' &&
    'payload' in value &&
    typeof value.payload === 'string' &&
    'signature' in value &&
    typeof value.signature === 'string'
  );
}

/** Minimal ACME server answering through the HTTP transport */
class FakeAcmeServer extends HttpClient {
  readonly signed: SignedRequest[] = [];
  private nonces = 0;

  constructor(private readonly accountKey: () => CryptoKey) {
    super();
  }

  private reply(statusCode: number, body: unknown, headers: Record<string, string> = {}): ParsedResponseData {
    return { statusCode, headers: { 'replay-nonce': `nonce-${++this.nonces}`, ...headers }, body };
  }

  override async send(
    method: string,
    url: string,
    options: { body?: unknown } = {},
  ): Promise<ParsedResponseData> {
    if (method === 'GET' && url === DIRECTORY_URL) {
      return {
        statusCode: 200,
        headers: {},
        body: {
          newNonce: 'https://ca.test/new-nonce',
          newAccount: 'https://ca.test/new-account',
          newOrder: 'https://ca.test/new-order',
        },
      };
    }
    if (method === 'HEAD') return this.reply(200, null);

    const jws = options.body;
    if (!isFlattenedJws(jws)) throw new Error(`unsigned ${method} ${url}`);
    await jose.flattenedVerify(jws, this.accountKey());
    const text = Buffer.from(jws.payload, 'base64url').toString('utf8');
    this.signed.push({ url, header: jose.decodeProtectedHeader(jws), payload: text ? JSON.parse(text) : null });

    switch (url) {
      case 'https://ca.test/new-account':
        return this.reply(201, { status: 'valid' }, { location: ACCOUNT_URL });
      case 'https://ca.test/new-order':
        return this.reply(
          201,
          {
            status: 'pending',
            identifiers: [{ type: 'dns', value: 'example.com' }],
            authorizations: ['https://ca.test/authz/1'],
            finalize: 'https://ca.test/order/1/finalize',
          },
          { location: 'https://ca.test/order/1' },
        );
      case 'https://ca.test/authz/1':
        return this.reply(200, {
          identifier: { type: 'dns', value: 'example.com' },
          status: 'pending',
          wildcard: true,
          challenges: [{ type: 'dns-01', url: 'https://ca.test/chall/1', status: 'pending', token: 'tok' }],
        });
      default:
        return this.reply(404, { type: 'urn:ietf:params:acme:error:malformed', detail: `no route ${url}` });
    }
  }
}

describe('AcmeAccount', () => {
  let keys: AccountKeys;
  let server: FakeAcmeServer;
  let account: AcmeAccount;

  beforeEach(async () => {
    keys = await generateAccountKeys();
    server = new FakeAcmeServer(() => keys.publicKey);
    account = new AcmeAccount(new AcmeClient(DIRECTORY_URL, { http: server }), keys);
  });

  test('registers with the embedded key and mailto contacts', async () => {
    const result = await account.register({ contact: 'admin@example.com', termsOfServiceAgreed: true });

    expect(result.accountUrl).toBe(ACCOUNT_URL);
    expect(account.kid).toBe(ACCOUNT_URL);

    const [request] = server.signed;
    expect(request?.payload).toEqual({ contact: ['mailto:admin@example.com'], termsOfServiceAgreed: true });
    expect(request?.header).toMatchObject({ alg: 'ES256', nonce: 'nonce-1', url: 'https://ca.test/new-account' });
    expect(request?.header.jwk).toMatchObject({ kty: 'EC', crv: 'P-256' });
    expect(request?.header.kid).toBeUndefined();
  });

  test('signs later requests with the account URL and the pooled nonce', async () => {
    await account.register({ contact: ['mailto:admin@example.com'], termsOfServiceAgreed: true });

    const order = await account.createOrder(['example.com', '*.example.com']);

    expect(order).toMatchObject({ status: 'pending', url: 'https://ca.test/order/1' });
    const request = server.signed[1];
    expect(request?.header).toMatchObject({ kid: ACCOUNT_URL, nonce: 'nonce-2' });
    expect(request?.header.jwk).toBeUndefined();
    expect(request?.payload).toEqual({
      identifiers: [
        { type: 'dns', value: 'example.com' },
        { type: 'dns', value: '*.example.com' },
      ],
    });
  });

  test('fetches authorizations with POST-as-GET and prepares the DNS-01 value', async () => {
    await account.register({ contact: 'admin@example.com', termsOfServiceAgreed: true });

    const authorization = await account.getAuthorization('https://ca.test/authz/1');
    const preparation = await account.prepareDns01(authorization);

    expect(server.signed[1]?.payload).toBeNull();
    expect(preparation.domain).toBe('*.example.com');
    expect(preparation.keyAuthorization).toBe(await account.keyAuthorization('tok'));
  });

  test('refuses account operations before registration', async () => {
    await expect(account.createOrder(['example.com'])).rejects.toBeInstanceOf(AccountError);
    await expect(account.createOrder(['example.com'])).rejects.toThrow(
      'Account not registered. Call register() first.',
    );
  });

  test('key authorization is the token and the JWK thumbprint of the account key', async () => {
    const thumbprint = await jose.calculateJwkThumbprint(await jose.exportJWK(keys.publicKey), 'sha256');

    await expect(account.keyAuthorization('token.with.dots')).resolves.toBe(`token.with.dots.${thumbprint}`);
    expect(thumbprint).toHaveLength(43);
  });
});
