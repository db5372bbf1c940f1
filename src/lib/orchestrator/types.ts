import type { RecordTarget } from '../dns/record-mapper.js';
import type { ProviderRecordId } from '../dns/dns-provider-gateway.js';
import type { AcmeAuthorizationStatus } from '../types/status.js';
import type { CleanupIncompleteError } from '../errors/orchestration-errors.js';

/**
 * Milestones of one orchestration run, in the order they are reached.
 * `issued` and `failed` are terminal.
 */
export const ORCHESTRATION_STATE = {
  IDLE: 'idle',
  PRE_CLEANUP: 'preCleanup',
  ORDER_PLACED: 'orderPlaced',
  TARGETS_RESOLVED: 'targetsResolved',
  RECORDS_PUBLISHED: 'recordsPublished',
  PROPAGATION_CONFIRMED: 'propagationConfirmed',
  CHALLENGES_ANSWERED: 'challengesAnswered',
  VALIDATION_POLLED: 'validationPolled',
  CLEANUP: 'cleanup',
  FINALIZED: 'finalized',
  ISSUED: 'issued',
  FAILED: 'failed',
} as const;

export type OrchestrationState = (typeof ORCHESTRATION_STATE)[keyof typeof ORCHESTRATION_STATE];

// ACME side, as consumed by the orchestrator

export interface Dns01Challenge {
  /** base64url SHA-256 digest to publish */
  recordValue: string;
  /** Tell the server the record is in place */
  answer(): Promise<void>;
}

export interface AuthorizationStatusReport {
  status: AcmeAuthorizationStatus;
  /** Server-provided reason when the authorization is invalid */
  reason?: string;
}

export interface AuthorizationHandle {
  /** Name as ordered, `*.`-prefixed for wildcard authorizations */
  domain: string;
  /** Status when the order was placed */
  status: AcmeAuthorizationStatus;
  dns01Challenge: Dns01Challenge | null;
  pollStatus(): Promise<AuthorizationStatusReport>;
}

export interface OrderHandle {
  authorizations: AuthorizationHandle[];
  /** Submit the CSR (base64url DER) and wait for the order to become valid */
  finalize(csr: string): Promise<void>;
  /** PEM certificate chain */
  downloadCertificate(): Promise<string>;
}

export interface AcmeOrderClient {
  placeOrder(domains: string[]): Promise<OrderHandle>;
}

// Run data

export interface ChallengeTarget extends RecordTarget {
  /** Distinct TXT values required by the authorizations bound to this record */
  expectedValues: string[];
}

export interface AuthorizationBinding {
  authorization: AuthorizationHandle;
  target: ChallengeTarget;
  /** Null when the authorization was already valid and needs no answer */
  challenge: Dns01Challenge | null;
}

export interface ProvisionedRecord {
  recordId: ProviderRecordId;
  recordName: string;
  value: string;
}

export interface CleanupReport {
  removed: ProvisionedRecord[];
  leftover: ProvisionedRecord[];
  error?: CleanupIncompleteError;
}

export interface IssuedOutcome {
  kind: 'issued';
  /** PEM chain, leaf first */
  certificateChain: string;
  /** PKCS#8 PEM */
  privateKey: string;
  cleanup: CleanupReport;
  warnings: string[];
}

export interface FailedOutcome {
  kind: 'failed';
  reason: string;
  error: Error;
  /** Last milestone reached before the failure */
  lastState: OrchestrationState;
  cleanup: CleanupReport;
  warnings: string[];
}

export type RunOutcome = IssuedOutcome | FailedOutcome;

export type PropagationTimeoutPolicy = 'proceed' | 'abort';

export type StateChangeListener = (from: OrchestrationState, to: OrchestrationState) => void;

/** Private key and CSR for the names of an order */
export interface CertificateRequest {
  csr: string;
  privateKeyPem: string;
}

export type CertificateRequestFactory = (domains: string[]) => Promise<CertificateRequest>;
