/**
 * Tool configuration
 *
 * A JSON file, overlaid by environment variables, overlaid by command line
 * overrides. Validation collects every problem before raising a single
 * {@link ConfigError}; the result is frozen.
 */

import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';

import { PROPAGATION_POLL_INTERVAL_MS, PUBLIC_RESOLVERS, DEFAULT_RECORD_TTL } from '../constants/defaults.js';
import { isCertificateAlgorithmName, type CertificateAlgorithmName } from '../crypto/csr.js';
import { isOvhEndpointName, type OvhCredentials } from '../dns/ovh-api-client.js';
import { ConfigError } from '../errors/orchestration-errors.js';
import type { PropagationTimeoutPolicy } from '../orchestrator/types.js';
import { debugOrchestrator } from '../utils/debug.js';

export const ACME_DIRECTORIES = {
  production: 'https://acme-v02.api.letsencrypt.org/directory',
  staging: 'https://acme-staging-v02.api.letsencrypt.org/directory',
} as const;

export interface ToolConfig {
  domains: readonly string[];
  email: string;
  acmeDirectoryUrl: string;
  dnsPropagationWaitSeconds: number;
  providerCredentials: Readonly<OvhCredentials>;
  zones: readonly string[];
  propagationPollIntervalSeconds: number;
  propagationTimeoutPolicy: PropagationTimeoutPolicy;
  resolvers: readonly string[];
  recordTtl: number;
  outputDir: string;
  /** JWK file of the ACME account key; generated when missing */
  accountKeyPath?: string;
  certificateAlgorithm: CertificateAlgorithmName;
}

/** Raw configuration keys, as found in the file or given on the command line */
export type ConfigInput = Record<string, unknown>;

type Env = Record<string, string | undefined>;

const ENV_CREDENTIALS = {
  endpoint: 'OVH_ENDPOINT',
  applicationKey: 'OVH_APPLICATION_KEY',
  applicationSecret: 'OVH_APPLICATION_SECRET',
  consumerKey: 'OVH_CONSUMER_KEY',
} as const satisfies Record<keyof OvhCredentials, string>;

const DEFAULT_PROPAGATION_WAIT_SECONDS = 60;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply the environment on top of the file contents
 */
export function applyEnvironment(input: ConfigInput, env: Env): ConfigInput {
  const result: ConfigInput = { ...input };

  const credentials: Record<string, unknown> = isRecord(input.providerCredentials)
    ? { ...input.providerCredentials }
    : {};
  for (const [key, variable] of Object.entries(ENV_CREDENTIALS)) {
    const value = env[variable];
    if (value) credentials[key] = value;
  }
  if (Object.keys(credentials).length) {
    result.providerCredentials = credentials;
  }

  if (env.ACME_EMAIL) result.email = env.ACME_EMAIL;
  if (env.ACME_DIRECTORY_URL) result.acmeDirectoryUrl = env.ACME_DIRECTORY_URL;
  return result;
}

/** `ip`, `ipv4:port` or `[ipv6]:port`, the forms a DNS resolver accepts */
export function isResolverAddress(value: string): boolean {
  if (isIP(value) !== 0) return true;
  const match = /^\[([^\]]+)\]:(\d+)$/.exec(value) ?? /^([^:]+):(\d+)$/.exec(value);
  if (!match) return false;
  const [, host = '', port = ''] = match;
  const portNumber = Number(port);
  return isIP(host) !== 0 && portNumber >= 1 && portNumber <= 65535;
}

class Reader {
  readonly issues: string[] = [];

  constructor(private readonly input: ConfigInput) {}

  string(key: string, fallback?: string): string {
    const value = this.input[key] ?? fallback;
    if (typeof value === 'string' && value.trim()) return value.trim();
    this.issues.push(value === undefined ? `${key} is required` : `${key} must be a non-empty string`);
    return '';
  }

  optionalString(key: string): string | undefined {
    const value = this.input[key];
    if (value === undefined) return undefined;
    return this.string(key);
  }

  stringList(key: string, fallback?: readonly string[], minLength = 0): string[] {
    const value = this.input[key] ?? fallback;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string' && v.trim() !== '')) {
      this.issues.push(value === undefined ? `${key} is required` : `${key} must be a list of non-empty strings`);
      return [];
    }
    if (value.length < minLength) {
      this.issues.push(`${key} must contain at least ${minLength} entr${minLength === 1 ? 'y' : 'ies'}`);
    }
    return value.map((v) => v.trim());
  }

  addressList(key: string, fallback: readonly string[]): string[] {
    const list = this.stringList(key, fallback, 1);
    const invalid = list.filter((address) => !isResolverAddress(address));
    if (invalid.length) {
      this.issues.push(`${key} must be IP addresses, got ${invalid.join(', ')}`);
    }
    return list;
  }

  number(key: string, fallback: number, { min = 0, integer = false } = {}): number {
    const value = this.input[key] ?? fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
      this.issues.push(`${key} must be ${integer ? 'an integer' : 'a number'} >= ${min}`);
      return fallback;
    }
    return value;
  }

  credentials(): OvhCredentials {
    const value = this.input.providerCredentials;
    const fallback: OvhCredentials = { endpoint: '', applicationKey: '', applicationSecret: '', consumerKey: '' };
    if (!isRecord(value)) {
      this.issues.push('providerCredentials is required');
      return fallback;
    }

    const nested = new Reader(value);
    const credentials: OvhCredentials = {
      endpoint: nested.string('endpoint', 'ovh-eu'),
      applicationKey: nested.string('applicationKey'),
      applicationSecret: nested.string('applicationSecret'),
      consumerKey: nested.string('consumerKey'),
    };
    if (credentials.endpoint && !isOvhEndpointName(credentials.endpoint) && !credentials.endpoint.startsWith('https://')) {
      nested.issues.push(`endpoint must be ovh-eu, ovh-ca, ovh-us or an https URL`);
    }
    this.issues.push(...nested.issues.map((issue) => `providerCredentials.${issue}`));
    return credentials;
  }
}

/**
 * Validate raw configuration (file contents with the environment applied)
 *
 * @throws {ConfigError} Listing every invalid or missing key
 */
export function parseConfig(input: unknown): Readonly<ToolConfig> {
  if (!isRecord(input)) {
    throw new ConfigError(['configuration must be a JSON object']);
  }

  const read = new Reader(input);
  const domains = read.stringList('domains', undefined, 1);
  const email = read.string('email');
  const acmeDirectoryUrl = read.string('acmeDirectoryUrl', ACME_DIRECTORIES.production);
  const providerCredentials = read.credentials();

  const propagationTimeoutPolicy = input.propagationTimeoutPolicy ?? 'proceed';
  if (propagationTimeoutPolicy !== 'proceed' && propagationTimeoutPolicy !== 'abort') {
    read.issues.push('propagationTimeoutPolicy must be "proceed" or "abort"');
  }
  const certificateAlgorithm = input.certificateAlgorithm ?? 'ec-p256';
  if (!isCertificateAlgorithmName(certificateAlgorithm)) {
    read.issues.push('certificateAlgorithm must be one of ec-p256, ec-p384, rsa-2048, rsa-3072, rsa-4096');
  }

  const config = {
    domains: Object.freeze(domains),
    email,
    acmeDirectoryUrl,
    dnsPropagationWaitSeconds: read.number('dnsPropagationWaitSeconds', DEFAULT_PROPAGATION_WAIT_SECONDS),
    providerCredentials: Object.freeze(providerCredentials),
    zones: Object.freeze(read.stringList('zones', [])),
    propagationPollIntervalSeconds: read.number(
      'propagationPollIntervalSeconds',
      PROPAGATION_POLL_INTERVAL_MS / 1000,
    ),
    propagationTimeoutPolicy: propagationTimeoutPolicy === 'abort' ? 'abort' : 'proceed',
    resolvers: Object.freeze(read.addressList('resolvers', PUBLIC_RESOLVERS)),
    recordTtl: read.number('recordTtl', DEFAULT_RECORD_TTL, { min: 1, integer: true }),
    outputDir: read.string('outputDir', '.'),
    accountKeyPath: read.optionalString('accountKeyPath'),
    certificateAlgorithm: isCertificateAlgorithmName(certificateAlgorithm) ? certificateAlgorithm : 'ec-p256',
  } satisfies ToolConfig;

  if (read.issues.length) {
    throw new ConfigError(read.issues);
  }
  return Object.freeze(config);
}

export interface LoadConfigOptions {
  env?: Env;
  /** Command line values; they take precedence over the file and the environment */
  overrides?: ConfigInput;
}

/**
 * Read, overlay and validate the configuration file at `path`
 *
 * @throws {ConfigError} When the file cannot be read, is not JSON or is invalid
 */
export async function loadConfig(path: string, options: LoadConfigOptions = {}): Promise<Readonly<ToolConfig>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw ConfigError.unreadable(path, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw ConfigError.unreadable(path, error);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${path} must contain a JSON object`]);
  }

  debugOrchestrator('loaded configuration from %s', path);
  const withEnv = applyEnvironment(parsed, options.env ?? process.env);
  return parseConfig({ ...withEnv, ...stripUndefined(options.overrides ?? {}) });
}

function stripUndefined(input: ConfigInput): ConfigInput {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
