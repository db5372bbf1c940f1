/**
 * Signed client for the OVH REST API
 *
 * Every call carries the application key, the consumer key, a timestamp
 * aligned on the server clock and the `$1$` SHA-1 signature of
 * `secret+consumer+METHOD+url+body+timestamp`.
 *
 * @see https://help.ovhcloud.com/csm/en-api-getting-started-ovhcloud-api
 */

import { createHash } from 'node:crypto';

import { HttpClient, headerValue, type HttpMethod } from '../transport/http-client.js';
import { getRetryAfterMs } from '../utils/retry.js';
import { debugOvh } from '../utils/debug.js';

export const OVH_ENDPOINTS = {
  'ovh-eu': 'https://eu.api.ovh.com/1.0',
  'ovh-ca': 'https://ca.api.ovh.com/1.0',
  'ovh-us': 'https://api.us.ovhcloud.com/1.0',
} as const;

export type OvhEndpointName = keyof typeof OVH_ENDPOINTS;

export function isOvhEndpointName(value: unknown): value is OvhEndpointName {
  return typeof value === 'string' && Object.hasOwn(OVH_ENDPOINTS, value);
}

export interface OvhCredentials {
  /** Endpoint name (`ovh-eu`, `ovh-ca`, `ovh-us`) or an API base URL */
  endpoint: string;
  applicationKey: string;
  applicationSecret: string;
  consumerKey: string;
}

export type QueryParams = Record<string, string | number | undefined>;

/**
 * The calls the DNS gateway makes; implemented by {@link OvhApiClient}
 */
export interface OvhRequester {
  call(method: HttpMethod, path: string, options?: { query?: QueryParams; body?: unknown }): Promise<unknown>;
}

/** Non-2xx answer of the OVH API */
export class OvhApiError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly errorCode?: string,
    readonly retryAfterMs: number | null = null,
  ) {
    super(message);
    this.name = 'OvhApiError';
  }
}

export interface OvhApiClientOptions {
  http?: HttpClient;
  /** Clock in milliseconds */
  now?: () => number;
  timeoutMs?: number;
}

export function resolveEndpoint(endpoint: string): string {
  if (isOvhEndpointName(endpoint)) return OVH_ENDPOINTS[endpoint];
  return endpoint.replace(/\/+$/, '');
}

export function signRequest(
  credentials: Pick<OvhCredentials, 'applicationSecret' | 'consumerKey'>,
  method: string,
  url: string,
  body: string,
  timestamp: number,
): string {
  const payload = [
    credentials.applicationSecret,
    credentials.consumerKey,
    method,
    url,
    body,
    String(timestamp),
  ].join('+');
  return '$1$' + createHash('sha1').update(payload).digest('hex');
}

function buildQuery(query: QueryParams = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.append(key, String(value));
  }
  const qs = params.toString();
  return qs ? `?${qs}` : '';
}

function problemMessage(body: unknown, fallback: string): { message: string; errorCode?: string } {
  if (typeof body === 'object' && body !== null) {
    const message: unknown = Reflect.get(body, 'message');
    const errorCode: unknown = Reflect.get(body, 'errorCode');
    return {
      message: typeof message === 'string' ? message : fallback,
      ...(typeof errorCode === 'string' ? { errorCode } : {}),
    };
  }
  return { message: typeof body === 'string' && body ? body : fallback };
}

export class OvhApiClient implements OvhRequester {
  readonly baseUrl: string;
  private readonly http: HttpClient;
  private readonly now: () => number;
  private readonly timeoutMs: number | undefined;
  /** Server time minus local time, in seconds */
  private timeDelta: number | null = null;

  constructor(
    private readonly credentials: OvhCredentials,
    options: OvhApiClientOptions = {},
  ) {
    this.baseUrl = resolveEndpoint(credentials.endpoint);
    this.http = options.http ?? new HttpClient();
    this.now = options.now ?? Date.now;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Offset between the API clock and the local clock, fetched once
   */
  async getTimeDelta(): Promise<number> {
    if (this.timeDelta !== null) return this.timeDelta;

    const res = await this.http.get(`${this.baseUrl}/auth/time`, { timeoutMs: this.timeoutMs });
    if (res.statusCode !== 200 || typeof res.body !== 'number') {
      const { message } = problemMessage(res.body, `GET /auth/time failed: HTTP ${res.statusCode}`);
      throw new OvhApiError(message, res.statusCode, undefined, getRetryAfterMs(res.headers));
    }

    this.timeDelta = res.body - Math.floor(this.now() / 1000);
    debugOvh('server time delta=%ds', this.timeDelta);
    return this.timeDelta;
  }

  async call(
    method: HttpMethod,
    path: string,
    options: { query?: QueryParams; body?: unknown } = {},
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}${buildQuery(options.query)}`;
    const body = options.body === undefined ? '' : JSON.stringify(options.body);
    const timestamp = Math.floor(this.now() / 1000) + (await this.getTimeDelta());

    const headers: Record<string, string> = {
      'X-Ovh-Application': this.credentials.applicationKey,
      'X-Ovh-Consumer': this.credentials.consumerKey,
      'X-Ovh-Timestamp': String(timestamp),
      'X-Ovh-Signature': signRequest(this.credentials, method, url, body, timestamp),
    };
    if (body) headers['Content-Type'] = 'application/json';

    debugOvh('%s %s', method, url);
    const res = await this.http.send(method, url, {
      headers,
      ...(body ? { body } : {}),
      timeoutMs: this.timeoutMs,
    });

    if (res.statusCode >= 200 && res.statusCode < 300) {
      return res.body;
    }

    const { message, errorCode } = problemMessage(
      res.body,
      `${method} ${path} failed: HTTP ${res.statusCode}`,
    );
    debugOvh(
      '%s %s failed status=%d errorCode=%s queryId=%s',
      method,
      path,
      res.statusCode,
      errorCode,
      headerValue(res.headers, 'x-ovh-queryid'),
    );
    throw new OvhApiError(message, res.statusCode, errorCode, getRetryAfterMs(res.headers));
  }
}
