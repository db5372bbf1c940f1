/**
 * RFC 8555 ACME Nonce Manager
 *
 * Keeps the anti-replay nonces handed out by the server: every response carries
 * a fresh `Replay-Nonce`, which is pooled and used by the next signed request.
 * When the pool is empty a nonce is fetched from `newNonce`.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.5
 */

import { BadNonceError } from '../errors/acme-server-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { headerValue, type ParsedResponseData } from '../transport/http-client.js';
import { debugNonce } from '../utils/debug.js';
import { getRetryAfterMs, withRetry } from '../utils/retry.js';

export type FetchLike = (url: string) => Promise<ParsedResponseData>;

export interface NonceManagerOptions {
  /** Absolute URL of the newNonce endpoint */
  newNonceUrl: string;
  fetch: FetchLike;
  /** Max nonce age (ms) before it is discarded. Defaults to 120 seconds. */
  maxAgeMs?: number;
  /** Pool size cap. Defaults to 32. */
  maxPool?: number;
}

interface NonceEntry {
  value: string;
  timestamp: number;
}

class NonceFetchError extends Error {
  constructor(
    readonly statusCode: number,
    readonly headers: ParsedResponseData['headers'],
  ) {
    super(`newNonce failed: HTTP ${statusCode}`);
    this.name = 'NonceFetchError';
  }
}

export class NonceManager {
  private readonly opts: Required<NonceManagerOptions>;
  private readonly pool: NonceEntry[] = [];

  constructor(opts: NonceManagerOptions) {
    this.opts = {
      maxAgeMs: 120_000,
      maxPool: 32,
      ...opts,
    };
  }

  /**
   * Newest unexpired pooled nonce, or a freshly fetched one
   */
  async get(): Promise<string> {
    this.cleanStale();

    const entry = this.pool.pop();
    if (entry) {
      debugNonce('returning pooled nonce, pool size now=%d', this.pool.length);
      return entry.value;
    }

    return this.fetchNewNonce();
  }

  /**
   * Store the `Replay-Nonce` of a response, if any
   */
  putFromResponse(res: ParsedResponseData): void {
    const nonce = headerValue(res.headers, 'replay-nonce');
    if (!nonce) return;

    if (this.pool.some((e) => e.value === nonce)) return;
    if (this.pool.length >= this.opts.maxPool) {
      this.pool.shift();
    }
    this.pool.push({ value: nonce, timestamp: Date.now() });
    debugNonce('stored nonce from response, pool size now=%d', this.pool.length);
  }

  get size(): number {
    return this.pool.length;
  }

  clear(): void {
    this.pool.length = 0;
  }

  /**
   * Execute a signed request, retrying with a new nonce when the server
   * answers `badNonce`. The last response is returned once attempts run out.
   */
  async withNonceRetry(
    fn: (nonce: string) => Promise<ParsedResponseData>,
    maxAttempts = 3,
  ): Promise<ParsedResponseData> {
    for (let attempt = 1; ; attempt++) {
      const nonce = await this.get();
      const res = await fn(nonce);
      this.putFromResponse(res);

      debugNonce('attempt %d: HTTP %d (pool size %d)', attempt, res.statusCode, this.pool.length);

      if (res.statusCode < 400 || attempt >= maxAttempts || !isBadNonce(res)) {
        return res;
      }
      debugNonce('badNonce on attempt %d, retrying with a fresh nonce', attempt);
    }
  }

  private async fetchNewNonce(): Promise<string> {
    debugNonce('fetching new nonce from %s', this.opts.newNonceUrl);

    const response = await withRetry(
      async () => {
        const res = await this.opts.fetch(this.opts.newNonceUrl);
        if (res.statusCode === 429 || res.statusCode === 503) {
          throw new NonceFetchError(res.statusCode, res.headers);
        }
        return res;
      },
      {
        shouldRetry: (error) => error instanceof NonceFetchError,
        retryAfterMs: (error) =>
          error instanceof NonceFetchError ? getRetryAfterMs(error.headers) : null,
      },
      'new-nonce',
    );

    if (response.statusCode !== 200 && response.statusCode !== 204) {
      throw createErrorFromProblem(response.body);
    }

    const nonce = headerValue(response.headers, 'replay-nonce');
    if (!nonce) {
      throw new BadNonceError('No replay-nonce header in response');
    }

    debugNonce('fetched new nonce');
    return nonce;
  }

  private cleanStale(): void {
    const cutoff = Date.now() - this.opts.maxAgeMs;
    for (let i = this.pool.length - 1; i >= 0; i--) {
      const entry = this.pool[i];
      if (entry && entry.timestamp < cutoff) {
        this.pool.splice(i, 1);
      }
    }
  }
}

function isBadNonce(res: ParsedResponseData): boolean {
  return createErrorFromProblem(res.body) instanceof BadNonceError;
}
