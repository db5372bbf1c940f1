/**
 * DNS Record Mapper
 *
 * Maps requested certificate names to the `_acme-challenge` TXT records that
 * must be published for them. `example.com` and `*.example.com` share one
 * record name; unrelated names never do. Pure, no I/O.
 */

import { CHALLENGE_RECORD_PREFIX } from '../constants/defaults.js';
import { InvalidDomainFormatError } from '../errors/orchestration-errors.js';

export interface RecordTarget {
  /** Fully qualified record name, e.g. `_acme-challenge.example.com` */
  recordName: string;
  /** DNS zone hosting the record */
  zone: string;
  /** Record name relative to the zone, e.g. `_acme-challenge.www` */
  subDomain: string;
  /** Requested names answered through this record, in request order */
  memberDomains: string[];
}

export interface MapperOptions {
  /** Zones managed at the provider; the longest matching suffix wins */
  zones?: readonly string[];
}

const LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;
const MAX_NAME_LENGTH = 253;

/**
 * Trim, lower-case and drop one trailing dot
 */
export function normalizeDomain(domain: string): string {
  const trimmed = domain.trim().toLowerCase();
  return trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed;
}

/**
 * Validate a normalized name and return it without its wildcard label
 *
 * @throws {InvalidDomainFormatError}
 */
export function baseNameOf(domain: string): string {
  if (!domain) {
    throw InvalidDomainFormatError.empty();
  }
  if (domain.length > MAX_NAME_LENGTH) {
    throw InvalidDomainFormatError.tooLong(domain);
  }

  const base = domain.startsWith('*.') ? domain.slice(2) : domain;
  const labels = base.split('.');

  for (const label of labels) {
    if (label.includes('*')) {
      throw InvalidDomainFormatError.misplacedWildcard(domain);
    }
    if (!LABEL.test(label)) {
      throw InvalidDomainFormatError.invalidLabel(domain, label);
    }
  }
  if (labels.length < 2) {
    throw InvalidDomainFormatError.singleLabel(domain);
  }

  return base;
}

/**
 * `_acme-challenge` record name for a requested name
 */
export function recordNameFor(domain: string): string {
  return `${CHALLENGE_RECORD_PREFIX}.${baseNameOf(normalizeDomain(domain))}`;
}

/**
 * Zone hosting `baseName`: the longest configured zone it belongs to,
 * otherwise its last two labels
 */
export function resolveZone(baseName: string, zones: readonly string[] = []): string {
  let best: string | undefined;
  for (const raw of zones) {
    const zone = normalizeDomain(raw);
    const matches = baseName === zone || baseName.endsWith(`.${zone}`);
    if (matches && (best === undefined || zone.length > best.length)) {
      best = zone;
    }
  }
  return best ?? baseName.split('.').slice(-2).join('.');
}

/**
 * Record name relative to its zone
 */
export function relativeName(recordName: string, zone: string): string {
  return recordName.slice(0, recordName.length - zone.length - 1);
}

/**
 * Deduplicated record targets for the requested names, in first-appearance order
 *
 * @throws {InvalidDomainFormatError} For the first invalid name
 */
export function mapDomainsToTargets(
  domains: readonly string[],
  options: MapperOptions = {},
): RecordTarget[] {
  const targets = new Map<string, RecordTarget>();

  for (const raw of domains) {
    const domain = normalizeDomain(raw);
    const base = baseNameOf(domain);
    const recordName = `${CHALLENGE_RECORD_PREFIX}.${base}`;

    const existing = targets.get(recordName);
    if (existing) {
      if (!existing.memberDomains.includes(domain)) {
        existing.memberDomains.push(domain);
      }
      continue;
    }

    const zone = resolveZone(base, options.zones);
    targets.set(recordName, {
      recordName,
      zone,
      subDomain: relativeName(recordName, zone),
      memberDomains: [domain],
    });
  }

  return [...targets.values()];
}
