/**
 * ACME client-side errors
 *
 * Raised by the bundled ACME client when an order, authorization, challenge or
 * account does not behave as expected. Distinct from {@link AcmeError}, which
 * carries a problem document sent by the server.
 */

/**
 * Base class for all ACME operation errors
 */
export abstract class AcmeOperationError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class AuthorizationError extends AcmeOperationError {
  readonly code = 'AUTHORIZATION_ERROR';
  readonly type = 'authorization';

  static unexpectedIdentifier(domain: string): AuthorizationError {
    return new AuthorizationError(`Order returned an authorization for unrequested name ${domain}`, {
      domain,
    });
  }

  static unexpectedStatus(domain: string, status: string): AuthorizationError {
    return new AuthorizationError(`Authorization for ${domain} is ${status}`, { domain, status });
  }
}

export class ChallengeError extends AcmeOperationError {
  readonly code = 'CHALLENGE_ERROR';
  readonly type = 'challenge';

  static notFound(challengeType: string, domain: string): ChallengeError {
    return new ChallengeError(`Challenge type ${challengeType} not offered for ${domain}`, {
      challengeType,
      domain,
    });
  }
}

export class OrderError extends AcmeOperationError {
  readonly code = 'ORDER_ERROR';
  readonly type = 'order';

  static noCertificateUrl(): OrderError {
    return new OrderError('Order does not have certificate URL', { missing: 'certificate' });
  }

  static invalid(orderUrl: string, reason?: string): OrderError {
    return new OrderError(`Order ${orderUrl} became invalid${reason ? `: ${reason}` : ''}`, {
      orderUrl,
      status: 'invalid',
      reason,
    });
  }

  static timeout(targetStatuses: string[], currentStatus: string, attempts: number): OrderError {
    return new OrderError(
      `Order did not reach ${targetStatuses.join(', ')} after ${attempts} attempts (current: ${currentStatus})`,
      { targetStatuses, currentStatus, attempts },
    );
  }
}

export class AccountError extends AcmeOperationError {
  readonly code = 'ACCOUNT_ERROR';
  readonly type = 'account';

  static notRegistered(): AccountError {
    return new AccountError('Account not registered. Call register() first.', {
      action: 'register_required',
    });
  }

  static noAccountUrl(): AccountError {
    return new AccountError('No account URL in registration response', {
      missing: 'location_header',
    });
  }
}
