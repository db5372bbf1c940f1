import { HttpClient } from '../transport/http-client.js';
import type { AcmeDirectory } from '../types/directory.js';
import { parseDirectory } from '../types/order.js';
import { NonceManager, type NonceManagerOptions } from '../managers/nonce-manager.js';
import { createErrorFromProblem } from '../errors/factory.js';

export interface AcmeClientOptions {
  /** Overrides for the nonce pool of every account using this client */
  nonce?: Partial<Omit<NonceManagerOptions, 'newNonceUrl' | 'fetch'>>;
  http?: HttpClient;
}

/**
 * RFC 8555 ACME client
 *
 * Entry point to one ACME server: holds the directory URL, fetches and caches
 * the directory and hands out the HTTP transport and nonce pools used by
 * signed requests.
 *
 * @example
 * ```typescript
 * const client = new AcmeClient('https://acme-staging-v02.api.letsencrypt.org/directory');
 * const directory = await client.getDirectory();
 * ```
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1 | RFC 8555 Section 7.1.1 - Directory}
 */
export class AcmeClient {
  public readonly directoryUrl: string;
  private readonly opts: AcmeClientOptions;
  private readonly http: HttpClient;

  private directory?: AcmeDirectory;

  constructor(directoryUrl: string, opts: AcmeClientOptions = {}) {
    this.directoryUrl = directoryUrl;
    this.opts = opts;
    this.http = opts.http ?? new HttpClient();
  }

  /**
   * Fetch and cache the server directory
   *
   * @throws {AcmeError} When the server answers with a problem document
   */
  public async getDirectory(): Promise<AcmeDirectory> {
    if (this.directory) return this.directory;

    const res = await this.http.get(this.directoryUrl);
    if (res.statusCode !== 200) {
      throw createErrorFromProblem(res.body);
    }

    this.directory = parseDirectory(res.body);
    return this.directory;
  }

  public getHttp(): HttpClient {
    return this.http;
  }

  /**
   * New nonce pool bound to this server's newNonce endpoint
   */
  public async createNonceManager(): Promise<NonceManager> {
    const directory = await this.getDirectory();
    return new NonceManager({
      ...this.opts.nonce,
      newNonceUrl: directory.newNonce,
      fetch: (url: string) => this.http.head(url),
    });
  }
}
