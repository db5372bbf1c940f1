/**
 * RFC 8555 ACME Account
 *
 * Facade over the request signer, order manager and challenge solver for one
 * account key pair: registration, orders, authorizations, challenges,
 * finalization and certificate download.
 *
 * @example
 * ```typescript
 * const account = new AcmeAccount(client, keys);
 * await account.register({ contact: 'admin@example.com', termsOfServiceAgreed: true });
 *
 * const order = await account.createOrder(['example.com', '*.example.com']);
 * const authz = await account.getAuthorization(order.authorizations[0]);
 * const { recordValue, challenge } = await account.prepareDns01(authz);
 * // publish _acme-challenge TXT recordValue, then
 * await account.acceptChallenge(challenge.url);
 * ```
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555
 */

import type { AcmeClient } from './acme-client.js';
import { AcmeRequestSigner, type AccountKeys } from './acme-request-signer.js';
import { AcmeOrderManager, type WaitOrderOptions } from './acme-order-manager.js';
import { AcmeChallengeSolver, type Dns01Preparation } from './acme-challenge-solver.js';
import type {
  AcmeOrder,
  AcmeChallenge,
  AcmeAuthorization,
  AcmeOrderStatus,
} from '../types/order.js';
import type { AcmeDirectory } from '../types/directory.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { AccountError } from '../errors/acme-errors.js';
import { headerValue } from '../transport/http-client.js';
import { debugAcme } from '../utils/debug.js';

export type { AccountKeys } from './acme-request-signer.js';

export interface AcmeAccountRegistrationPayload {
  /** One or more contact email addresses (may include or omit mailto:) */
  contact: string[] | string;
  termsOfServiceAgreed: true;
}

export interface AcmeAccountOptions {
  /** Account URL of an already registered account */
  kid?: string;
}

export class AcmeAccount {
  private readonly signer: AcmeRequestSigner;
  private readonly orders: AcmeOrderManager;
  private readonly challenges: AcmeChallengeSolver;

  constructor(client: AcmeClient, keys: AccountKeys, opts: AcmeAccountOptions = {}) {
    this.signer = new AcmeRequestSigner(client, keys, opts);
    this.orders = new AcmeOrderManager(this.signer);
    this.challenges = new AcmeChallengeSolver(this.signer);
  }

  get keys(): AccountKeys {
    return this.signer.keys;
  }

  get kid(): string {
    return this.signer.kid;
  }

  getDirectory(): Promise<AcmeDirectory> {
    return this.signer.getDirectory();
  }

  /**
   * Register the account, or look up the existing one bound to this key
   * (the server answers 200 instead of 201 in that case)
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
   */
  async register({ contact, termsOfServiceAgreed }: AcmeAccountRegistrationPayload): Promise<{
    accountUrl: string;
    account: unknown;
  }> {
    const directory = await this.getDirectory();
    const contacts = Array.isArray(contact) ? contact : [contact];
    const payload = {
      contact: contacts.map((email) => (email.startsWith('mailto:') ? email : `mailto:${email}`)),
      termsOfServiceAgreed,
    };

    const response = await this.signer.signedPost(directory.newAccount, payload, true);

    if (response.statusCode !== 200 && response.statusCode !== 201) {
      throw createErrorFromProblem(response.body);
    }

    const accountUrl = headerValue(response.headers, 'location');
    if (!accountUrl) {
      throw AccountError.noAccountUrl();
    }

    this.signer.kid = accountUrl;
    debugAcme('account %s url=%s', response.statusCode === 201 ? 'created' : 'found', accountUrl);

    return { accountUrl, account: response.body };
  }

  private requireRegistered(): void {
    if (!this.signer.kid) {
      throw AccountError.notRegistered();
    }
  }

  async createOrder(identifiers: string[]): Promise<AcmeOrder> {
    this.requireRegistered();
    return this.orders.createOrder(identifiers);
  }

  async getAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    this.requireRegistered();
    return this.challenges.getAuthorization(authzUrl);
  }

  async prepareDns01(authorization: AcmeAuthorization): Promise<Dns01Preparation> {
    return this.challenges.prepareDns01(authorization);
  }

  async acceptChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    this.requireRegistered();
    return this.challenges.acceptChallenge(challengeUrl);
  }

  keyAuthorization(token: string): Promise<string> {
    return this.signer.keyAuthorization(token);
  }

  async finalize(order: AcmeOrder, csrDerBase64Url: string): Promise<AcmeOrder> {
    this.requireRegistered();
    return this.orders.finalize(order, csrDerBase64Url);
  }

  async waitOrder(
    order: AcmeOrder,
    targetStatuses: AcmeOrderStatus[],
    options?: WaitOrderOptions,
  ): Promise<AcmeOrder> {
    this.requireRegistered();
    return this.orders.waitOrder(order, targetStatuses, options);
  }

  async downloadCertificate(order: AcmeOrder): Promise<string> {
    this.requireRegistered();
    return this.orders.downloadCertificate(order);
  }
}
