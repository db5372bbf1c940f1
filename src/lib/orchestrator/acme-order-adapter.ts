/**
 * Exposes the bundled ACME account through the order interface the
 * orchestrator consumes.
 */

import type { AcmeAccount } from '../core/acme-account.js';
import { authorizationDomain, authorizationFailureReason } from '../core/acme-challenge-solver.js';
import type { AcmeAuthorization } from '../types/order.js';
import { AUTHORIZATION_STATUS, CHALLENGE_TYPE, ORDER_STATUS } from '../types/status.js';
import { debugAcme } from '../utils/debug.js';
import type { PollPolicy } from '../utils/retry.js';
import type {
  AcmeOrderClient,
  AuthorizationHandle,
  AuthorizationStatusReport,
  Dns01Challenge,
  OrderHandle,
} from './types.js';

export interface AccountOrderClientOptions {
  /** Polling of the order while it is processed */
  orderPoll?: Partial<PollPolicy>;
  signal?: AbortSignal;
}

/** The account calls an order goes through */
export type OrderAccount = Pick<
  AcmeAccount,
  | 'createOrder'
  | 'getAuthorization'
  | 'prepareDns01'
  | 'acceptChallenge'
  | 'finalize'
  | 'waitOrder'
  | 'downloadCertificate'
>;

export class AccountOrderClient implements AcmeOrderClient {
  constructor(
    private readonly account: OrderAccount,
    private readonly options: AccountOrderClientOptions = {},
  ) {}

  async placeOrder(domains: string[]): Promise<OrderHandle> {
    let order = await this.account.createOrder(domains);

    const authorizations: AuthorizationHandle[] = [];
    for (const url of order.authorizations) {
      const authorization = await this.account.getAuthorization(url);
      authorizations.push(await this.toHandle(url, authorization));
    }

    const waitOptions = { policy: this.options.orderPoll, signal: this.options.signal };

    return {
      authorizations,
      finalize: async (csr) => {
        const ready = await this.account.waitOrder(
          order,
          [ORDER_STATUS.READY, ORDER_STATUS.VALID],
          waitOptions,
        );
        if (ready.status === ORDER_STATUS.VALID) {
          order = ready;
          return;
        }
        const finalized = await this.account.finalize(ready, csr);
        order = await this.account.waitOrder(finalized, [ORDER_STATUS.VALID], waitOptions);
      },
      downloadCertificate: () => this.account.downloadCertificate(order),
    };
  }

  private async toHandle(url: string, authorization: AcmeAuthorization): Promise<AuthorizationHandle> {
    const domain = authorizationDomain(authorization);
    const hasDns01 = authorization.challenges.some((ch) => ch.type === CHALLENGE_TYPE.DNS_01);

    let dns01Challenge: Dns01Challenge | null = null;
    if (hasDns01) {
      const { challenge, recordValue } = await this.account.prepareDns01(authorization);
      dns01Challenge = {
        recordValue,
        answer: async () => {
          await this.account.acceptChallenge(challenge.url);
        },
      };
    }

    return {
      domain,
      status: authorization.status,
      dns01Challenge,
      pollStatus: async (): Promise<AuthorizationStatusReport> => {
        const current = await this.account.getAuthorization(url);
        debugAcme('authorization %s status=%s', domain, current.status);
        if (
          current.status === AUTHORIZATION_STATUS.PENDING ||
          current.status === AUTHORIZATION_STATUS.VALID
        ) {
          return { status: current.status };
        }
        return { status: current.status, reason: authorizationFailureReason(current) };
      },
    };
  }
}
