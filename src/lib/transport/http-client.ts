import { request } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { describeError } from '../utils/logger.js';
import { buildUserAgent } from '../utils/user-agent.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'DELETE';

export type HttpHeaders = Record<string, string | string[] | undefined>;

/**
 * Response with its body already consumed: JSON for `application/json` and
 * problem documents, text for `text/*` and PEM chains, a Buffer otherwise.
 */
export interface ParsedResponseData {
  statusCode: number;
  headers: HttpHeaders;
  body: unknown;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  /** Serialised as JSON unless it is already a string or bytes */
  body?: unknown;
  signal?: AbortSignal;
  /** Overall request timeout */
  timeoutMs?: number;
}

/**
 * HTTP transport shared by the ACME client and the DNS provider client
 *
 * Injects the User-Agent, serialises request bodies, parses responses by
 * content type and traces every exchange on the `acme-dns01:http` namespace.
 */
export class HttpClient {
  private static userAgent = buildUserAgent();

  get(url: string, options?: HttpRequestOptions): Promise<ParsedResponseData> {
    return this.send('GET', url, options);
  }

  post(url: string, body: unknown, options: HttpRequestOptions = {}): Promise<ParsedResponseData> {
    return this.send('POST', url, { ...options, body });
  }

  head(url: string, options?: HttpRequestOptions): Promise<ParsedResponseData> {
    return this.send('HEAD', url, options);
  }

  delete(url: string, options?: HttpRequestOptions): Promise<ParsedResponseData> {
    return this.send('DELETE', url, options);
  }

  async send(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<ParsedResponseData> {
    const headers = this.ensureUserAgent({ ...options.headers });
    const body = serializeBody(options.body);
    debugHttp('%s %s init headers=%j body=%j', method, url, redactHeaders(headers), describeBody(body));
    const start = Date.now();

    try {
      const res = await request(url, {
        method,
        headers,
        body,
        signal: options.signal,
        ...(options.timeoutMs !== undefined
          ? { headersTimeout: options.timeoutMs, bodyTimeout: options.timeoutMs }
          : {}),
      });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      this.logRateLimit(method, url, res.statusCode, res.headers);

      let data: unknown;
      if (method === 'HEAD') {
        await res.body.dump();
      } else {
        data = await parseResponseBody(res.headers, res.body);
        debugHttp('%s %s response body=%j', method, url, data);
      }

      return { statusCode: res.statusCode, headers: res.headers, body: data };
    } catch (err) {
      debugHttp('%s %s network error: %s', method, url, describeError(err));
      throw err;
    }
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = HttpClient.userAgent;
    }
    return headers;
  }

  private logRateLimit(
    method: string,
    url: string,
    statusCode: number,
    headers: HttpHeaders,
  ): void {
    if (statusCode === 429 || statusCode === 503) {
      debugHttp(
        'RATE LIMIT DETECTED: %s %s status=%d retry-after=%s',
        method,
        url,
        statusCode,
        headers['retry-after'] ?? 'NOT_SET',
      );
    }
  }
}

/** First value of a response header, header names being lower-case */
export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const raw = headers[name.toLowerCase()];
  return Array.isArray(raw) ? raw[raw.length - 1] : raw;
}

function serializeBody(body: unknown): string | Uint8Array | null {
  if (body === undefined || body === null) return null;
  if (typeof body === 'string' || body instanceof Uint8Array) return body;
  return JSON.stringify(body);
}

async function parseResponseBody(
  headers: HttpHeaders,
  body: { json(): Promise<unknown>; text(): Promise<string>; arrayBuffer(): Promise<ArrayBuffer> },
): Promise<unknown> {
  const ct = headerValue(headers, 'content-type')?.toLowerCase() ?? '';

  if (ct.includes('application/json') || ct.includes('application/problem+json')) {
    const text = await body.text();
    return text.length ? JSON.parse(text) : null;
  }
  if (ct.startsWith('text/') || ct.includes('application/pem-certificate-chain')) {
    return body.text();
  }

  const buf = await body.arrayBuffer();
  return buf.byteLength ? Buffer.from(buf) : null;
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key] = /^x-ovh-(signature|consumer)$/i.test(key) ? '<redacted>' : value;
  }
  return out;
}

function describeBody(body: string | Uint8Array | null): unknown {
  if (body === null) return { type: 'null' };
  if (typeof body === 'string') {
    return {
      type: 'string',
      length: body.length,
      preview: body.length > 120 ? body.slice(0, 120) + '...' : body,
    };
  }
  return { type: 'bytes', length: body.length };
}
