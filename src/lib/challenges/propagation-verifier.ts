/**
 * Propagation Verifier
 *
 * Polls public resolvers until an `_acme-challenge` TXT value is visible. This
 * is a bounded best-effort check: it does not query the authoritative servers.
 */

import { Resolver } from 'node:dns/promises';

import {
  PROPAGATION_POLL_INTERVAL_MS,
  PUBLIC_RESOLVERS,
  RESOLVER_TIMEOUT_MS,
  RESOLVER_TRIES,
} from '../constants/defaults.js';
import { PropagationCheckUnavailableError } from '../errors/orchestration-errors.js';
import { debugPropagation } from '../utils/debug.js';
import { errorCode } from '../utils/logger.js';
import { pollUntil } from '../utils/retry.js';

/** TXT lookup returning each record as its list of character-string fragments */
export type TxtLookup = (recordName: string) => Promise<string[][]>;

export interface PropagationVerifier {
  /**
   * Resolve to true once `expectedValue` is served, false when `timeoutMs`
   * elapses first. At least one lookup is always made.
   *
   * @throws {PropagationCheckUnavailableError} When every lookup in the window failed
   */
  waitForPropagation(
    recordName: string,
    expectedValue: string,
    timeoutMs: number,
    pollIntervalMs?: number,
    signal?: AbortSignal,
  ): Promise<boolean>;
}

/** Answers meaning "no such record yet", as opposed to a failed lookup */
const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'ENODATA']);

function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && NOT_FOUND_CODES.has(code);
}

export interface ResolverLookupOptions {
  timeoutMs?: number;
  tries?: number;
}

export function createResolverLookup(
  servers: readonly string[] = PUBLIC_RESOLVERS,
  options: ResolverLookupOptions = {},
): TxtLookup {
  const resolver = new Resolver({
    timeout: options.timeoutMs ?? RESOLVER_TIMEOUT_MS,
    tries: options.tries ?? RESOLVER_TRIES,
  });
  resolver.setServers([...servers]);
  return (recordName) => resolver.resolveTxt(recordName);
}

export interface DnsPropagationVerifierOptions {
  lookup?: TxtLookup;
  /** Resolver addresses used when no lookup is given */
  resolvers?: readonly string[];
  now?: () => number;
}

export class DnsPropagationVerifier implements PropagationVerifier {
  private readonly lookup: TxtLookup;
  private readonly now: () => number;

  constructor(options: DnsPropagationVerifierOptions = {}) {
    this.lookup = options.lookup ?? createResolverLookup(options.resolvers);
    this.now = options.now ?? Date.now;
  }

  /** Values currently served at `recordName`, fragments joined */
  async currentValues(recordName: string): Promise<string[]> {
    try {
      const records = await this.lookup(recordName);
      return records.map((fragments) => fragments.join(''));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  async waitForPropagation(
    recordName: string,
    expectedValue: string,
    timeoutMs: number,
    pollIntervalMs = PROPAGATION_POLL_INTERVAL_MS,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const deadline = this.now() + Math.max(0, timeoutMs);
    const intervalMs = Math.max(0, pollIntervalMs);
    const maxAttempts = intervalMs > 0 ? Math.floor(Math.max(0, timeoutMs) / intervalMs) + 1 : 1;

    debugPropagation(
      'waiting for %s to serve %s (up to %d lookups every %dms)',
      recordName,
      expectedValue,
      maxAttempts,
      intervalMs,
    );

    const result = await pollUntil(
      () => this.currentValues(recordName),
      (values) => values.includes(expectedValue),
      { maxAttempts, intervalMs },
      { tolerateErrors: true, signal, context: `propagation ${recordName}`, deadline, now: this.now },
    );

    if (result.done) {
      debugPropagation('%s visible after %d lookup(s)', recordName, result.attempts);
      return true;
    }
    if (result.failures === result.attempts) {
      throw new PropagationCheckUnavailableError(recordName, result.attempts, result.lastError);
    }

    debugPropagation('%s not visible after %d lookup(s)', recordName, result.attempts);
    return false;
  }
}
