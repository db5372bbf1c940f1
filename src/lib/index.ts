/**
 * acme-dns01-ovh library exports
 *
 * DNS-01 certificate issuance through the OVH DNS API: the challenge
 * orchestrator and its collaborators, plus the RFC 8555 client it runs on.
 */

// Entry points
export { run, cleanup, type RunnerOptions, type RunResult, type CleanupOptions } from './runner.js';
export {
  loadConfig,
  parseConfig,
  applyEnvironment,
  ACME_DIRECTORIES,
  type ToolConfig,
  type ConfigInput,
  type LoadConfigOptions,
} from './config/config.js';

// Orchestration
export {
  ChallengeOrchestrator,
  type OrchestratorDependencies,
  type OrchestratorOptions,
  type RunOptions,
} from './orchestrator/challenge-orchestrator.js';
export { AccountOrderClient, type AccountOrderClientOptions, type OrderAccount } from './orchestrator/acme-order-adapter.js';
export {
  purgeChallengeRecords,
  type PurgeOptions,
  type PurgeReport,
  type PurgeFailure,
} from './orchestrator/cleanup.js';
export * from './orchestrator/types.js';

// DNS
export {
  mapDomainsToTargets,
  normalizeDomain,
  baseNameOf,
  recordNameFor,
  resolveZone,
  relativeName,
  type RecordTarget,
  type MapperOptions,
} from './dns/record-mapper.js';
export {
  OvhDnsGateway,
  classifyProviderError,
  type DnsProviderGateway,
  type OvhDnsGatewayOptions,
  type ProviderRecordId,
  type TxtRecord,
} from './dns/dns-provider-gateway.js';
export {
  OvhApiClient,
  OvhApiError,
  OVH_ENDPOINTS,
  signRequest,
  type OvhCredentials,
  type OvhRequester,
} from './dns/ovh-api-client.js';
export * from './challenges/index.js';

// ACME client
export { AcmeClient, type AcmeClientOptions } from './core/acme-client.js';
export { AcmeAccount, type AcmeAccountOptions, type AccountKeys } from './core/acme-account.js';
export { dns01RecordValue } from './core/acme-challenge-solver.js';
export { NonceManager, type NonceManagerOptions } from './managers/nonce-manager.js';
export { HttpClient, type ParsedResponseData } from './transport/http-client.js';
export type { AcmeDirectory } from './types/directory.js';
export type { AcmeOrder, AcmeAuthorization, AcmeChallenge, AcmeIdentifier } from './types/order.js';
export * from './types/status.js';

// Errors
export * from './errors/orchestration-errors.js';
export * from './errors/acme-errors.js';
export * from './errors/acme-server-errors.js';
export { createErrorFromProblem } from './errors/factory.js';
export { ACME_ERROR, type AcmeErrorType } from './errors/codes.js';

// Crypto and files
export * from './crypto/index.js';
export { writeCertificateFiles, certificateBaseName, type CertificateFiles } from './storage/certificate-files.js';

export * from './utils/index.js';
