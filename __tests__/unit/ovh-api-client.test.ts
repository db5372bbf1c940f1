import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { createHash } from 'node:crypto';

interface MockResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: {
    text(): Promise<string>;
    json(): Promise<unknown>;
    arrayBuffer(): Promise<ArrayBuffer>;
    dump(): Promise<void>;
  };
}

interface MockRequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

const mockRequest = jest.fn<(url: string, options: MockRequestOptions) => Promise<MockResponse>>();

jest.mock('undici', () => ({
  request: (url: string, options: MockRequestOptions) => mockRequest(url, options),
}));

import { OvhApiClient, OvhApiError, resolveEndpoint } from '../../src/lib/dns/ovh-api-client.js';

function jsonResponse(statusCode: number, payload: unknown, headers: Record<string, string> = {}): MockResponse {
  const text = JSON.stringify(payload);
  return {
    statusCode,
    headers: { 'content-type': 'application/json; charset=utf-8', ...headers },
    body: {
      text: async () => text,
      json: async () => JSON.parse(text),
      arrayBuffer: async () => new ArrayBuffer(0),
      dump: async () => undefined,
    },
  };
}

const credentials = {
  endpoint: 'ovh-eu',
  applicationKey: 'test-app-key',
  applicationSecret: 'test-secret',
  consumerKey: 'test-consumer',
};

const BASE = 'https://eu.api.ovh.com/1.0';
// Local clock at 1_700_000_000s, API clock 5s ahead
const now = () => 1_700_000_000_000;

function expectedSignature(method: string, url: string, body: string, timestamp: number): string {
  const payload = `test-secret+test-consumer+${method}+${url}+${body}+${timestamp}`;
  return '$1$' + createHash('sha1').update(payload).digest('hex');
}

function requestAt(index: number): { url: string; options: MockRequestOptions } {
  const call = mockRequest.mock.calls[index];
  if (!call) throw new Error(`no request #${index}`);
  return { url: call[0], options: call[1] };
}

describe('OvhApiClient', () => {
  beforeEach(() => {
    mockRequest.mockReset();
  });

  it('resolves endpoint names and keeps explicit URLs', () => {
    expect(resolveEndpoint('ovh-ca')).toBe('https://ca.api.ovh.com/1.0');
    expect(resolveEndpoint('https://api.example.test/1.0/')).toBe('https://api.example.test/1.0');
  });

  it('signs GET requests with the query string and the server-aligned timestamp', async () => {
    mockRequest
      .mockResolvedValueOnce(jsonResponse(200, 1_700_000_005))
      .mockResolvedValueOnce(jsonResponse(200, [11, 12]));
    const client = new OvhApiClient(credentials, { now });

    const ids = await client.call('GET', '/domain/zone/example.com/record', {
      query: { fieldType: 'TXT', subDomain: '_acme-challenge' },
    });

    expect(ids).toEqual([11, 12]);
    expect(requestAt(0).url).toBe(`${BASE}/auth/time`);

    const { url, options } = requestAt(1);
    expect(url).toBe(`${BASE}/domain/zone/example.com/record?fieldType=TXT&subDomain=_acme-challenge`);
    expect(options.method).toBe('GET');
    expect(options.headers).toMatchObject({
      'X-Ovh-Application': 'test-app-key',
      'X-Ovh-Consumer': 'test-consumer',
      'X-Ovh-Timestamp': '1700000005',
      'X-Ovh-Signature': expectedSignature('GET', url, '', 1_700_000_005),
    });
    expect(options.headers?.['Content-Type']).toBeUndefined();
  });

  it('sends and signs JSON bodies', async () => {
    mockRequest
      .mockResolvedValueOnce(jsonResponse(200, 1_700_000_000))
      .mockResolvedValueOnce(jsonResponse(200, { id: 42 }));
    const client = new OvhApiClient(credentials, { now });
    const record = { fieldType: 'TXT', subDomain: '_acme-challenge', target: 'abc', ttl: 60 };

    const created = await client.call('POST', '/domain/zone/example.com/record', { body: record });

    expect(created).toEqual({ id: 42 });
    const { url, options } = requestAt(1);
    const body = '{"fieldType":"TXT","subDomain":"_acme-challenge","target":"abc","ttl":60}';
    expect(options.body).toBe(body);
    expect(options.headers).toMatchObject({
      'Content-Type': 'application/json',
      'X-Ovh-Signature': expectedSignature('POST', url, body, 1_700_000_000),
    });
  });

  it('fetches the server time only once', async () => {
    mockRequest
      .mockResolvedValueOnce(jsonResponse(200, 1_700_000_000))
      .mockResolvedValueOnce(jsonResponse(200, null))
      .mockResolvedValueOnce(jsonResponse(200, null));
    const client = new OvhApiClient(credentials, { now });

    await client.call('POST', '/domain/zone/example.com/refresh');
    await client.call('POST', '/domain/zone/example.org/refresh');

    expect(mockRequest.mock.calls.map(([url]) => url)).toEqual([
      `${BASE}/auth/time`,
      `${BASE}/domain/zone/example.com/refresh`,
      `${BASE}/domain/zone/example.org/refresh`,
    ]);
  });

  it('raises OvhApiError with the API message and error code', async () => {
    mockRequest
      .mockResolvedValueOnce(jsonResponse(200, 1_700_000_000))
      .mockResolvedValueOnce(
        jsonResponse(403, { message: 'This credential is not valid', errorCode: 'INVALID_CREDENTIAL' }),
      );
    const client = new OvhApiClient(credentials, { now });

    const error = await client.call('GET', '/domain/zone/example.com/record').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OvhApiError);
    expect(error).toMatchObject({
      message: 'This credential is not valid',
      statusCode: 403,
      errorCode: 'INVALID_CREDENTIAL',
      retryAfterMs: null,
    });
  });

  it('reads Retry-After on rate limited answers', async () => {
    mockRequest
      .mockResolvedValueOnce(jsonResponse(200, 1_700_000_000))
      .mockResolvedValueOnce(jsonResponse(429, { message: 'Too many requests' }, { 'retry-after': '7' }));
    const client = new OvhApiClient(credentials, { now });

    await expect(client.call('GET', '/domain/zone/example.com/record')).rejects.toMatchObject({
      statusCode: 429,
      retryAfterMs: 7000,
    });
  });
});
