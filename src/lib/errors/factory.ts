import {
  AccountDoesNotExistError,
  BadCSRError,
  BadNonceError,
  CAAError,
  CompoundError,
  ConnectionError,
  DNSError,
  IncorrectResponseError,
  InvalidContactError,
  MalformedError,
  OrderNotReadyError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  UnauthorizedError,
  UnsupportedIdentifierError,
  AcmeError,
} from './acme-server-errors.js';
import { ACME_ERROR } from './codes.js';

type Ctor = new (detail?: string, status?: number) => AcmeError;

const FACTORY = new Map<string, Ctor>([
  [ACME_ERROR.accountDoesNotExist, AccountDoesNotExistError],
  [ACME_ERROR.badCSR, BadCSRError],
  [ACME_ERROR.badNonce, BadNonceError],
  [ACME_ERROR.caa, CAAError],
  [ACME_ERROR.compound, CompoundError],
  [ACME_ERROR.connection, ConnectionError],
  [ACME_ERROR.dns, DNSError],
  [ACME_ERROR.incorrectResponse, IncorrectResponseError],
  [ACME_ERROR.invalidContact, InvalidContactError],
  [ACME_ERROR.malformed, MalformedError],
  [ACME_ERROR.orderNotReady, OrderNotReadyError],
  [ACME_ERROR.rejectedIdentifier, RejectedIdentifierError],
  [ACME_ERROR.serverInternal, ServerInternalError],
  [ACME_ERROR.unauthorized, UnauthorizedError],
  [ACME_ERROR.unsupportedIdentifier, UnsupportedIdentifierError],
]);

interface Problem {
  type?: string;
  detail?: string;
  status?: number;
  instance?: string;
  retryAfter?: string | number;
  subproblems?: unknown[];
}

function readProblem(value: object): Problem {
  const problem: Problem = {};
  const str = (key: string): string | undefined => {
    const v: unknown = Reflect.get(value, key);
    return typeof v === 'string' ? v : undefined;
  };

  problem.type = str('type');
  problem.detail = str('detail') ?? str('title');
  problem.instance = str('instance');

  const status: unknown = Reflect.get(value, 'status');
  if (typeof status === 'number') problem.status = status;

  const retryAfter: unknown = Reflect.get(value, 'retryAfter');
  if (typeof retryAfter === 'string' || typeof retryAfter === 'number') {
    problem.retryAfter = retryAfter;
  }

  const subproblems: unknown = Reflect.get(value, 'subproblems');
  if (Array.isArray(subproblems)) problem.subproblems = subproblems;

  return problem;
}

/**
 * Build the matching {@link AcmeError} subclass from an RFC 7807 problem body
 */
export function createErrorFromProblem(problem: unknown): AcmeError {
  if (!problem || typeof problem !== 'object') {
    return new AcmeError('Unknown error shape');
  }

  const p = readProblem(problem);
  const detail = p.detail ?? 'Unknown error';
  let type = p.type ?? ACME_ERROR.serverInternal;

  // Some CAs answer "Errors during validation" without the compound type
  if (
    type === ACME_ERROR.serverInternal &&
    detail === 'Errors during validation' &&
    p.subproblems?.length
  ) {
    type = ACME_ERROR.compound;
  }

  let err: AcmeError;
  if (type === ACME_ERROR.rateLimited) {
    const retryAfter = p.retryAfter !== undefined ? new Date(p.retryAfter) : undefined;
    err = new RateLimitedError(detail, p.status ?? 429, retryAfter);
  } else {
    const ctor = FACTORY.get(type);
    err = ctor
      ? new ctor(detail, p.status)
      : new AcmeError(detail, p.status, { type });
  }

  if (p.instance) err.instance = p.instance;

  for (const sub of p.subproblems ?? []) {
    err.addSubproblem(createErrorFromProblem(sub));
  }

  return err;
}
