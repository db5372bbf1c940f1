/**
 * Challenge Orchestrator
 *
 * Drives one DNS-01 issuance run through its milestones:
 *
 * idle -> preCleanup -> orderPlaced -> targetsResolved -> recordsPublished
 *      -> propagationConfirmed -> challengesAnswered -> validationPolled
 *      -> cleanup -> finalized -> issued
 *
 * Any failure jumps to cleanup and ends in `failed`. Every TXT record created
 * during the run is deleted in cleanup, whatever happened before, including
 * cancellation through the run's AbortSignal.
 */

import {
  AUTHORIZATION_POLL_BACKOFF_FACTOR,
  AUTHORIZATION_POLL_INTERVAL_MS,
  AUTHORIZATION_POLL_MAX_ATTEMPTS,
  AUTHORIZATION_POLL_MAX_INTERVAL_MS,
  PROPAGATION_POLL_INTERVAL_MS,
} from '../constants/defaults.js';
import { AuthorizationError, ChallengeError } from '../errors/acme-errors.js';
import {
  ChallengeValidationFailedError,
  CleanupIncompleteError,
  InvalidDomainFormatError,
  PropagationCheckUnavailableError,
  PropagationTimeoutError,
  RunAbortedError,
  type ValidationFailure,
} from '../errors/orchestration-errors.js';
import type { PropagationVerifier } from '../challenges/propagation-verifier.js';
import type { DnsProviderGateway } from '../dns/dns-provider-gateway.js';
import { mapDomainsToTargets, normalizeDomain, type RecordTarget } from '../dns/record-mapper.js';
import { AUTHORIZATION_STATUS, CHALLENGE_TYPE } from '../types/status.js';
import { debugOrchestrator } from '../utils/debug.js';
import { createDebugLogger, describeError, toError, type Logger } from '../utils/logger.js';
import { pollUntil, type PollPolicy } from '../utils/retry.js';
import {
  ORCHESTRATION_STATE,
  type AcmeOrderClient,
  type AuthorizationBinding,
  type CertificateRequestFactory,
  type ChallengeTarget,
  type CleanupReport,
  type FailedOutcome,
  type OrchestrationState,
  type OrderHandle,
  type PropagationTimeoutPolicy,
  type ProvisionedRecord,
  type RunOutcome,
  type StateChangeListener,
} from './types.js';

export interface OrchestratorDependencies {
  acme: AcmeOrderClient;
  gateway: DnsProviderGateway;
  verifier: PropagationVerifier;
  createCertificateRequest: CertificateRequestFactory;
}

export interface OrchestratorOptions {
  /** Budget shared by all propagation checks of a run */
  propagationWaitMs: number;
  propagationPollIntervalMs?: number;
  /** What to do when a record is not visible in time (default `proceed`) */
  propagationTimeoutPolicy?: PropagationTimeoutPolicy;
  authorizationPoll?: Partial<PollPolicy>;
  /** Zones managed at the provider, see `resolveZone` */
  zones?: readonly string[];
  /** Delete stale records at the target names before ordering (default true) */
  preCleanup?: boolean;
  /** List the published records back from the provider (default true) */
  verifyProviderRecords?: boolean;
  logger?: Logger;
  onStateChange?: StateChangeListener;
  /** Clock in milliseconds */
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** Mutable state of a single run */
class RunContext {
  state: OrchestrationState = ORCHESTRATION_STATE.IDLE;
  readonly provisioned: ProvisionedRecord[] = [];
  readonly warnings: string[] = [];

  constructor(readonly signal: AbortSignal | undefined) {}

  checkAborted(): void {
    this.signal?.throwIfAborted();
  }
}

const EMPTY_CLEANUP: CleanupReport = { removed: [], leftover: [] };

/**
 * Requested names, normalized, duplicates dropped, order kept
 */
function uniqueDomains(domains: readonly string[]): string[] {
  return [...new Set(domains.map(normalizeDomain))];
}

export class ChallengeOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly pollPolicy: PollPolicy;

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly options: OrchestratorOptions,
  ) {
    this.logger = options.logger ?? createDebugLogger(debugOrchestrator);
    this.now = options.now ?? Date.now;
    this.pollPolicy = {
      maxAttempts: AUTHORIZATION_POLL_MAX_ATTEMPTS,
      intervalMs: AUTHORIZATION_POLL_INTERVAL_MS,
      backoffFactor: AUTHORIZATION_POLL_BACKOFF_FACTOR,
      maxIntervalMs: AUTHORIZATION_POLL_MAX_INTERVAL_MS,
      ...options.authorizationPoll,
    };
  }

  async run(domains: readonly string[], runOptions: RunOptions = {}): Promise<RunOutcome> {
    const run = new RunContext(runOptions.signal);

    let targets: RecordTarget[];
    try {
      targets = mapDomainsToTargets(domains, { zones: this.options.zones });
    } catch (error) {
      if (error instanceof InvalidDomainFormatError) {
        this.logger.error(error.message);
        return this.failed(run, error, run.state, EMPTY_CLEANUP);
      }
      throw error;
    }

    const requested = uniqueDomains(domains);
    let order: OrderHandle | undefined;
    let failure: { error: Error; state: OrchestrationState } | undefined;
    let cleanup: CleanupReport = EMPTY_CLEANUP;

    try {
      run.checkAborted();
      if (this.options.preCleanup ?? true) {
        await this.preCleanup(targets);
      }
      this.advance(run, ORCHESTRATION_STATE.PRE_CLEANUP);

      run.checkAborted();
      this.logger.info(`Placing order for ${requested.join(', ')}`);
      order = await this.deps.acme.placeOrder(requested);
      this.advance(run, ORCHESTRATION_STATE.ORDER_PLACED);

      const { bindings, challengeTargets } = this.bind(order, targets);
      this.advance(run, ORCHESTRATION_STATE.TARGETS_RESOLVED);

      await this.publish(run, challengeTargets);
      this.advance(run, ORCHESTRATION_STATE.RECORDS_PUBLISHED);

      await this.confirmPropagation(run);
      this.advance(run, ORCHESTRATION_STATE.PROPAGATION_CONFIRMED);

      await this.answer(run, bindings);
      this.advance(run, ORCHESTRATION_STATE.CHALLENGES_ANSWERED);

      await this.pollValidation(run, bindings);
      this.advance(run, ORCHESTRATION_STATE.VALIDATION_POLLED);
    } catch (error) {
      failure = { error: this.toRunError(run, error), state: run.state };
    } finally {
      cleanup = await this.cleanup(run);
      this.advance(run, ORCHESTRATION_STATE.CLEANUP);
    }

    if (failure) {
      this.logger.error(failure.error.message);
      return this.failed(run, failure.error, failure.state, cleanup);
    }
    if (!order) {
      return this.failed(run, new Error('No order was placed'), run.state, cleanup);
    }

    try {
      run.checkAborted();
      const request = await this.deps.createCertificateRequest(requested);
      this.logger.info('Finalizing order');
      await order.finalize(request.csr);
      const certificateChain = await order.downloadCertificate();
      this.advance(run, ORCHESTRATION_STATE.FINALIZED);
      this.advance(run, ORCHESTRATION_STATE.ISSUED);
      this.logger.info(`Certificate issued for ${requested.join(', ')}`);

      return {
        kind: 'issued',
        certificateChain,
        privateKey: request.privateKeyPem,
        cleanup,
        warnings: run.warnings,
      };
    } catch (error) {
      const runError = this.toRunError(run, error);
      this.logger.error(runError.message);
      return this.failed(run, runError, run.state, cleanup);
    }
  }

  private advance(run: RunContext, to: OrchestrationState): void {
    const from = run.state;
    run.state = to;
    debugOrchestrator('state %s -> %s', from, to);
    this.options.onStateChange?.(from, to);
  }

  private warn(run: RunContext, message: string): void {
    run.warnings.push(message);
    this.logger.warn(message);
  }

  private toRunError(run: RunContext, error: unknown): Error {
    if (run.signal?.aborted) {
      return error instanceof RunAbortedError ? error : new RunAbortedError(run.state, run.signal.reason);
    }
    return toError(error);
  }

  private failed(
    run: RunContext,
    error: Error,
    lastState: OrchestrationState,
    cleanup: CleanupReport,
  ): FailedOutcome {
    if (run.state !== ORCHESTRATION_STATE.IDLE) {
      this.advance(run, ORCHESTRATION_STATE.FAILED);
    }
    return {
      kind: 'failed',
      reason: error.message,
      error,
      lastState,
      cleanup,
      warnings: run.warnings,
    };
  }

  /**
   * Remove leftovers of earlier runs at the target names; never fails the run
   */
  private async preCleanup(targets: RecordTarget[]): Promise<void> {
    const zones = new Set<string>();

    for (const target of targets) {
      try {
        const stale = await this.deps.gateway.listTxtRecords(target.recordName);
        for (const record of stale) {
          await this.deps.gateway.deleteTxtRecord(record.recordId);
          zones.add(record.recordId.zone);
          this.logger.info(`Removed stale TXT record ${record.recordName}`);
        }
      } catch (error) {
        this.logger.warn(`Pre-cleanup of ${target.recordName} failed: ${describeError(error)}`);
      }
    }

    for (const zone of zones) {
      await this.deps.gateway.refreshZone(zone);
    }
  }

  /**
   * Attach each authorization to the record it is answered through
   */
  private bind(
    order: OrderHandle,
    targets: RecordTarget[],
  ): { bindings: AuthorizationBinding[]; challengeTargets: ChallengeTarget[] } {
    const byDomain = new Map<string, ChallengeTarget>();
    const challengeTargets = targets.map((target) => {
      const challengeTarget: ChallengeTarget = {
        ...target,
        memberDomains: [...target.memberDomains],
        expectedValues: [],
      };
      for (const domain of target.memberDomains) byDomain.set(domain, challengeTarget);
      return challengeTarget;
    });

    const bindings = order.authorizations.map((authorization): AuthorizationBinding => {
      const domain = normalizeDomain(authorization.domain);
      const target = byDomain.get(domain);
      if (!target) {
        throw AuthorizationError.unexpectedIdentifier(domain);
      }

      if (authorization.status === AUTHORIZATION_STATUS.VALID) {
        debugOrchestrator('authorization for %s already valid', domain);
        return { authorization, target, challenge: null };
      }
      if (authorization.status !== AUTHORIZATION_STATUS.PENDING) {
        throw AuthorizationError.unexpectedStatus(domain, authorization.status);
      }

      const challenge = authorization.dns01Challenge;
      if (!challenge) {
        throw ChallengeError.notFound(CHALLENGE_TYPE.DNS_01, domain);
      }
      if (!target.expectedValues.includes(challenge.recordValue)) {
        target.expectedValues.push(challenge.recordValue);
      }
      return { authorization, target, challenge };
    });

    return { bindings, challengeTargets };
  }

  /**
   * One create per distinct (recordName, value); every success is owned by the run
   */
  private async publish(run: RunContext, targets: ChallengeTarget[]): Promise<void> {
    for (const target of targets) {
      for (const value of target.expectedValues) {
        run.checkAborted();
        const recordId = await this.deps.gateway.createTxtRecord(target.recordName, value);
        run.provisioned.push({ recordId, recordName: target.recordName, value });
      }
    }

    if (this.options.verifyProviderRecords ?? true) {
      await this.verifyAtProvider(run, targets);
    }
  }

  private async verifyAtProvider(run: RunContext, targets: ChallengeTarget[]): Promise<void> {
    for (const target of targets) {
      if (!target.expectedValues.length) continue;
      try {
        const present = new Set(
          (await this.deps.gateway.listTxtRecords(target.recordName)).map((r) => r.value),
        );
        const missing = target.expectedValues.filter((v) => !present.has(v));
        if (missing.length) {
          this.warn(
            run,
            `Provider lists ${target.expectedValues.length - missing.length}/${target.expectedValues.length} expected values at ${target.recordName}`,
          );
        }
      } catch (error) {
        this.warn(run, `Could not list ${target.recordName} at the provider: ${describeError(error)}`);
      }
    }
  }

  private async confirmPropagation(run: RunContext): Promise<void> {
    const deadline = this.now() + this.options.propagationWaitMs;
    const pollIntervalMs = this.options.propagationPollIntervalMs ?? PROPAGATION_POLL_INTERVAL_MS;
    const policy = this.options.propagationTimeoutPolicy ?? 'proceed';

    for (const record of run.provisioned) {
      run.checkAborted();
      const timeoutMs = Math.max(0, deadline - this.now());

      let visible: boolean;
      try {
        visible = await this.deps.verifier.waitForPropagation(
          record.recordName,
          record.value,
          timeoutMs,
          pollIntervalMs,
          run.signal,
        );
      } catch (error) {
        if (error instanceof PropagationCheckUnavailableError) {
          this.warn(run, `${error.message}; continuing without a propagation check`);
          continue;
        }
        throw error;
      }

      if (visible) {
        this.logger.info(`${record.recordName} is visible on public resolvers`);
      } else if (policy === 'abort') {
        throw new PropagationTimeoutError(record.recordName, this.options.propagationWaitMs);
      } else {
        this.warn(run, `${record.recordName} not visible on public resolvers yet; proceeding`);
      }
    }
  }

  private async answer(run: RunContext, bindings: AuthorizationBinding[]): Promise<void> {
    for (const { authorization, challenge } of bindings) {
      if (!challenge) continue;
      run.checkAborted();
      await challenge.answer();
      debugOrchestrator('answered challenge for %s', authorization.domain);
    }
  }

  /**
   * Poll every answered authorization, collecting every failure before raising
   */
  private async pollValidation(run: RunContext, bindings: AuthorizationBinding[]): Promise<void> {
    const failures: ValidationFailure[] = [];

    for (const { authorization, challenge } of bindings) {
      if (!challenge) continue;
      const domain = authorization.domain;

      try {
        const result = await pollUntil(
          () => authorization.pollStatus(),
          (report) => report.status !== AUTHORIZATION_STATUS.PENDING,
          this.pollPolicy,
          { signal: run.signal, context: `authorization ${domain}` },
        );
        const report = result.value;

        if (!result.done || !report) {
          failures.push({ domain, reason: `still pending after ${result.attempts} polls` });
        } else if (report.status !== AUTHORIZATION_STATUS.VALID) {
          failures.push({ domain, reason: report.reason ?? `authorization ${report.status}` });
        } else {
          this.logger.info(`Authorization for ${domain} is valid`);
        }
      } catch (error) {
        if (run.signal?.aborted) throw error;
        failures.push({ domain, reason: describeError(error) });
      }
    }

    if (failures.length) {
      throw new ChallengeValidationFailedError(failures);
    }
  }

  /**
   * Delete every record the run created; failures are reported, not thrown
   */
  private async cleanup(run: RunContext): Promise<CleanupReport> {
    const removed: ProvisionedRecord[] = [];
    const leftover: ProvisionedRecord[] = [];
    const errors: unknown[] = [];
    const zones = new Set<string>();

    for (const record of run.provisioned) {
      try {
        await this.deps.gateway.deleteTxtRecord(record.recordId);
        removed.push(record);
        zones.add(record.recordId.zone);
      } catch (error) {
        leftover.push(record);
        errors.push(error);
        this.logger.error(
          `Could not delete TXT record ${record.recordName} (id ${record.recordId.id}): ${describeError(error)}`,
        );
      }
    }

    for (const zone of zones) {
      await this.deps.gateway.refreshZone(zone);
    }

    if (!leftover.length) {
      if (removed.length) this.logger.info(`Removed ${removed.length} challenge record(s)`);
      return { removed, leftover };
    }
    return { removed, leftover, error: new CleanupIncompleteError(leftover, errors) };
  }
}
