/**
 * ACME Order Manager
 *
 * Certificate order lifecycle: creation, finalization, status polling and
 * certificate download per RFC 8555 Section 7.4.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4
 */

import { ORDER_POLL_MAX_ATTEMPTS, ORDER_POLL_INTERVAL_MS } from '../constants/defaults.js';
import { parseOrder, type AcmeOrder, type AcmeOrderStatus } from '../types/order.js';
import { ORDER_STATUS } from '../types/status.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { OrderError } from '../errors/acme-errors.js';
import { headerValue } from '../transport/http-client.js';
import { pollUntil, type PollPolicy } from '../utils/retry.js';
import { debugAcme } from '../utils/debug.js';
import type { AcmeRequestSigner } from './acme-request-signer.js';

export interface WaitOrderOptions {
  policy?: Partial<PollPolicy>;
  signal?: AbortSignal;
}

export class AcmeOrderManager {
  constructor(private readonly signer: AcmeRequestSigner) {}

  /**
   * Create a new order for DNS identifiers (wildcards included)
   */
  async createOrder(identifiers: string[]): Promise<AcmeOrder> {
    const directory = await this.signer.getDirectory();

    const payload = {
      identifiers: identifiers.map((domain) => ({
        type: 'dns',
        value: domain,
      })),
    };

    const response = await this.signer.signedPost(directory.newOrder, payload);

    if (response.statusCode !== 201) {
      throw createErrorFromProblem(response.body);
    }

    const url = headerValue(response.headers, 'location') ?? '';
    debugAcme('order created url=%s identifiers=%j', url, identifiers);
    return parseOrder(response.body, url);
  }

  async getOrder(orderUrl: string): Promise<AcmeOrder> {
    const response = await this.signer.signedPost(orderUrl, null);
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }
    return parseOrder(response.body, orderUrl);
  }

  /**
   * Submit the CSR (base64url DER) of a `ready` order
   */
  async finalize(order: AcmeOrder, csrDerBase64Url: string): Promise<AcmeOrder> {
    const response = await this.signer.signedPost(order.finalize, { csr: csrDerBase64Url });

    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }

    return parseOrder(response.body, order.url);
  }

  /**
   * Poll the order until it reaches one of `targetStatuses`
   *
   * @throws {OrderError} When the order turns `invalid` or polling runs out
   */
  async waitOrder(
    order: AcmeOrder,
    targetStatuses: AcmeOrderStatus[],
    options: WaitOrderOptions = {},
  ): Promise<AcmeOrder> {
    if (targetStatuses.includes(order.status)) return order;

    const policy: PollPolicy = {
      maxAttempts: ORDER_POLL_MAX_ATTEMPTS,
      intervalMs: ORDER_POLL_INTERVAL_MS,
      ...options.policy,
    };
    const isSettled = (o: AcmeOrder) =>
      targetStatuses.includes(o.status) || o.status === ORDER_STATUS.INVALID;

    const result = await pollUntil(() => this.getOrder(order.url), isSettled, policy, {
      signal: options.signal,
      context: `order ${order.url}`,
    });
    const current = result.value ?? order;

    if (targetStatuses.includes(current.status)) {
      return current;
    }
    if (current.status === ORDER_STATUS.INVALID) {
      throw OrderError.invalid(
        order.url,
        current.error !== undefined ? createErrorFromProblem(current.error).describe() : undefined,
      );
    }
    throw OrderError.timeout(targetStatuses, current.status, result.attempts);
  }

  /**
   * Download the PEM chain of a `valid` order
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4.2
   */
  async downloadCertificate(order: AcmeOrder): Promise<string> {
    if (!order.certificate) {
      throw OrderError.noCertificateUrl();
    }

    const response = await this.signer.signedPost(order.certificate, null);

    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }
    if (typeof response.body === 'string') {
      return response.body;
    }
    if (Buffer.isBuffer(response.body)) {
      return response.body.toString('utf8');
    }
    throw new OrderError('Certificate download returned no PEM chain', { url: order.certificate });
  }
}
