import { describe, it, expect } from '@jest/globals';

import {
  InvalidDomainFormatError,
  mapDomainsToTargets,
  normalizeDomain,
  recordNameFor,
  relativeName,
  resolveZone,
} from '../../src/index.js';

describe('mapDomainsToTargets', () => {
  it('groups the apex and its wildcard under one record', () => {
    expect(mapDomainsToTargets(['example.com', '*.example.com'])).toEqual([
      {
        recordName: '_acme-challenge.example.com',
        zone: 'example.com',
        subDomain: '_acme-challenge',
        memberDomains: ['example.com', '*.example.com'],
      },
    ]);
  });

  it('keeps unrelated names on distinct records, in request order', () => {
    const targets = mapDomainsToTargets(['www.example.org', 'example.com', '*.www.example.org']);

    expect(targets.map((t) => [t.recordName, t.memberDomains])).toEqual([
      ['_acme-challenge.www.example.org', ['www.example.org', '*.www.example.org']],
      ['_acme-challenge.example.com', ['example.com']],
    ]);
    expect(targets[0]?.subDomain).toBe('_acme-challenge.www');
  });

  it('normalizes names and collapses duplicates', () => {
    const targets = mapDomainsToTargets([' Example.COM. ', 'example.com']);

    expect(targets).toHaveLength(1);
    expect(targets[0]?.memberDomains).toEqual(['example.com']);
  });

  it('places records in the longest configured zone', () => {
    const [target] = mapDomainsToTargets(['*.app.dev.example.co.uk'], {
      zones: ['example.co.uk', 'dev.example.co.uk'],
    });

    expect(target).toMatchObject({
      recordName: '_acme-challenge.app.dev.example.co.uk',
      zone: 'dev.example.co.uk',
      subDomain: '_acme-challenge.app',
    });
  });

  it.each([
    ['', 'domain name is empty'],
    ['localhost', 'at least two labels are required'],
    ['www.*.example.com', 'a wildcard is only allowed as a single leading "*." label'],
    ['-bad.example.com', 'label "-bad" must be 1-63 characters of [a-z0-9-] without a leading or trailing hyphen'],
    ['exa_mple.com', 'label "exa_mple" must be 1-63 characters of [a-z0-9-] without a leading or trailing hyphen'],
  ])('rejects %j', (domain, reason) => {
    expect(() => mapDomainsToTargets([domain])).toThrow(InvalidDomainFormatError);
    try {
      mapDomainsToTargets([domain]);
    } catch (error) {
      expect(error).toMatchObject({ reason, code: 'INVALID_DOMAIN_FORMAT' });
    }
  });

  it('rejects names longer than 253 characters', () => {
    const long = `${'a'.repeat(63)}.${'b'.repeat(63)}.${'c'.repeat(63)}.${'d'.repeat(63)}.com`;

    expect(() => mapDomainsToTargets([long])).toThrow('name exceeds 253 characters');
  });
});

describe('record name helpers', () => {
  it('derives record names for apex and wildcard names', () => {
    expect(recordNameFor('*.Example.com')).toBe('_acme-challenge.example.com');
    expect(normalizeDomain('WWW.example.com.')).toBe('www.example.com');
  });

  it('falls back to the last two labels without configured zones', () => {
    expect(resolveZone('a.b.example.com')).toBe('example.com');
    expect(resolveZone('a.b.example.com', ['other.org'])).toBe('example.com');
    expect(relativeName('_acme-challenge.a.b.example.com', 'example.com')).toBe('_acme-challenge.a.b');
  });
});
