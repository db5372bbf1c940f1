import { describe, it, expect, jest, beforeEach } from '@jest/globals';

interface MockRequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

const mockRequest = jest.fn<(url: string, options: MockRequestOptions) => Promise<unknown>>();

jest.mock('undici', () => ({
  request: (url: string, options: MockRequestOptions) => mockRequest(url, options),
}));

import { HttpClient, headerValue } from '../../src/lib/transport/http-client.js';

function respond(statusCode: number, contentType: string | undefined, text: string) {
  const dump = jest.fn(async () => undefined);
  mockRequest.mockResolvedValueOnce({
    statusCode,
    headers: contentType ? { 'content-type': contentType } : {},
    body: {
      text: async () => text,
      json: async () => JSON.parse(text),
      arrayBuffer: async () => new TextEncoder().encode(text).buffer,
      dump,
    },
  });
  return dump;
}

function lastOptions(): MockRequestOptions {
  const call = mockRequest.mock.calls[mockRequest.mock.calls.length - 1];
  if (!call) throw new Error('no request was sent');
  return call[1];
}

describe('HttpClient', () => {
  beforeEach(() => {
    mockRequest.mockReset();
  });

  it('parses JSON and problem documents', async () => {
    const client = new HttpClient();
    respond(200, 'application/json', '{"ok":true}');
    respond(400, 'application/problem+json', '{"type":"urn:ietf:params:acme:error:malformed"}');

    await expect(client.get('https://ca.test/a')).resolves.toMatchObject({ statusCode: 200, body: { ok: true } });
    await expect(client.get('https://ca.test/b')).resolves.toMatchObject({
      statusCode: 400,
      body: { type: 'urn:ietf:params:acme:error:malformed' },
    });
  });

  it('returns PEM chains as text and other payloads as bytes', async () => {
    const client = new HttpClient();
    respond(200, 'application/pem-certificate-chain', '-----BEGIN CERTIFICATE-----');
    respond(200, 'application/octet-stream', 'raw');

    await expect(client.get('https://ca.test/cert')).resolves.toMatchObject({ body: '-----BEGIN CERTIFICATE-----' });
    const bytes = await client.get('https://ca.test/bin');
    expect(Buffer.isBuffer(bytes.body) && bytes.body.toString()).toBe('raw');
  });

  it('serializes objects to JSON and sends a User-Agent', async () => {
    const client = new HttpClient();
    respond(201, 'application/json', '{}');

    await client.post(
      'https://ca.test/new-order',
      { identifiers: [] },
      { headers: { 'Content-Type': 'application/jose+json' } },
    );

    const options = lastOptions();
    expect(options.method).toBe('POST');
    expect(options.body).toBe('{"identifiers":[]}');
    expect(options.headers?.['Content-Type']).toBe('application/jose+json');
    expect(options.headers?.['User-Agent']).toMatch(/^acme-dns01-ovh\/\S+ \(Node\/\d+/);
  });

  it('keeps a caller-supplied User-Agent', async () => {
    const client = new HttpClient();
    respond(200, 'application/json', '{}');

    await client.get('https://ca.test/a', { headers: { 'user-agent': 'custom/1.0' } });

    expect(lastOptions().headers).toEqual({ 'user-agent': 'custom/1.0' });
  });

  it('drains HEAD responses without parsing them', async () => {
    const client = new HttpClient();
    const dump = respond(200, undefined, '');

    const res = await client.head('https://ca.test/new-nonce');

    expect(res.body).toBeUndefined();
    expect(dump).toHaveBeenCalledTimes(1);
  });

  it('reads the last value of repeated headers', () => {
    expect(headerValue({ link: ['<a>', '<b>'] }, 'Link')).toBe('<b>');
    expect(headerValue({}, 'location')).toBeUndefined();
  });
});
