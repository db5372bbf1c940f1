/**
 * Entry points assembling the collaborators of a run from a configuration
 */

import { DnsPropagationVerifier, type PropagationVerifier } from './challenges/propagation-verifier.js';
import type { ToolConfig } from './config/config.js';
import { AcmeAccount } from './core/acme-account.js';
import { AcmeClient } from './core/acme-client.js';
import { loadOrCreateAccountKeys } from './crypto/account-keys.js';
import { createCsrFactory } from './crypto/certificate-request.js';
import { OvhDnsGateway, type DnsProviderGateway } from './dns/dns-provider-gateway.js';
import { OvhApiClient } from './dns/ovh-api-client.js';
import { mapDomainsToTargets } from './dns/record-mapper.js';
import { AccountOrderClient } from './orchestrator/acme-order-adapter.js';
import { ChallengeOrchestrator } from './orchestrator/challenge-orchestrator.js';
import { purgeChallengeRecords, type PurgeReport } from './orchestrator/cleanup.js';
import {
  ORCHESTRATION_STATE,
  type AcmeOrderClient,
  type CertificateRequestFactory,
  type FailedOutcome,
  type IssuedOutcome,
  type StateChangeListener,
} from './orchestrator/types.js';
import { writeCertificateFiles, type CertificateFiles } from './storage/certificate-files.js';
import { debugOrchestrator } from './utils/debug.js';
import { createDebugLogger, toError, type Logger } from './utils/logger.js';

export interface RunnerOptions {
  logger?: Logger;
  signal?: AbortSignal;
  onStateChange?: StateChangeListener;
  /** Replace the ACME client built from the configuration */
  acme?: AcmeOrderClient;
  /** Replace the OVH gateway built from the configuration */
  gateway?: DnsProviderGateway;
  verifier?: PropagationVerifier;
  createCertificateRequest?: CertificateRequestFactory;
  /** Write `<name>.crt` and `<name>.key` on success (default true) */
  writeFiles?: boolean;
}

export type RunResult = (IssuedOutcome & { files?: CertificateFiles }) | FailedOutcome;

function createGateway(config: ToolConfig, logger: Logger): DnsProviderGateway {
  return new OvhDnsGateway(new OvhApiClient(config.providerCredentials), {
    zones: config.zones,
    ttl: config.recordTtl,
    logger,
  });
}

async function createAcmeOrderClient(config: ToolConfig, signal?: AbortSignal): Promise<AcmeOrderClient> {
  const keys = await loadOrCreateAccountKeys(config.accountKeyPath);
  const account = new AcmeAccount(new AcmeClient(config.acmeDirectoryUrl), keys);
  await account.register({ contact: config.email, termsOfServiceAgreed: true });
  debugOrchestrator('ACME account ready: %s', account.kid);
  return new AccountOrderClient(account, { signal });
}

/**
 * Obtain a certificate for `config.domains`
 *
 * Failures of the run itself come back as a `failed` outcome, including an
 * ACME account that cannot be registered; only writing the files may throw.
 */
export async function run(config: ToolConfig, options: RunnerOptions = {}): Promise<RunResult> {
  const logger = options.logger ?? createDebugLogger(debugOrchestrator);

  let acme: AcmeOrderClient;
  try {
    acme = options.acme ?? (await createAcmeOrderClient(config, options.signal));
  } catch (error) {
    const failure = toError(error);
    logger.error(`ACME account setup failed: ${failure.message}`);
    return {
      kind: 'failed',
      reason: failure.message,
      error: failure,
      lastState: ORCHESTRATION_STATE.IDLE,
      cleanup: { removed: [], leftover: [] },
      warnings: [],
    };
  }

  const orchestrator = new ChallengeOrchestrator(
    {
      acme,
      gateway: options.gateway ?? createGateway(config, logger),
      verifier: options.verifier ?? new DnsPropagationVerifier({ resolvers: config.resolvers }),
      createCertificateRequest: options.createCertificateRequest ?? createCsrFactory(config.certificateAlgorithm),
    },
    {
      propagationWaitMs: config.dnsPropagationWaitSeconds * 1000,
      propagationPollIntervalMs: config.propagationPollIntervalSeconds * 1000,
      propagationTimeoutPolicy: config.propagationTimeoutPolicy,
      zones: config.zones,
      logger,
      onStateChange: options.onStateChange,
    },
  );

  const outcome = await orchestrator.run(config.domains, { signal: options.signal });
  if (outcome.kind === 'failed' || options.writeFiles === false) {
    return outcome;
  }

  const files = await writeCertificateFiles(
    config.outputDir,
    config.domains,
    outcome.certificateChain,
    outcome.privateKey,
  );
  logger.info(`Certificate written to ${files.certificatePath}, key to ${files.privateKeyPath}`);
  return { ...outcome, files };
}

export interface CleanupOptions {
  logger?: Logger;
  gateway?: DnsProviderGateway;
  /**
   * `domains` removes the records at the challenge names of the configured
   * domains; `zones` removes every challenge record of their zones
   */
  scope?: 'domains' | 'zones';
}

/**
 * Remove `_acme-challenge` TXT records left behind by interrupted runs
 */
export async function cleanup(config: ToolConfig, options: CleanupOptions = {}): Promise<PurgeReport> {
  const logger = options.logger ?? createDebugLogger(debugOrchestrator);
  const gateway = options.gateway ?? createGateway(config, logger);

  if (options.scope === 'zones') {
    const zones = config.zones.length
      ? config.zones
      : [...new Set(mapDomainsToTargets(config.domains).map((target) => target.zone))];
    return purgeChallengeRecords(gateway, { zones, logger });
  }

  return purgeChallengeRecords(gateway, { domains: config.domains, zones: config.zones, logger });
}
