/**
 * Unit tests for record normalization.
 */

import { describe, it, expect } from 'vitest';
import { classify } from '@/normalization/classifier.js';
import {
  NOT_AVAILABLE,
  normalizeRecord,
  summarizeGeoIp,
  summarizeSsl,
} from '@/normalization/normalizer.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeWhois(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    datasource: 'whois',
    domain: 'evil.example.com',
    registrar: 'Example Registrar, Inc.',
    created: '2024-01-15T10:00:00Z',
    email: ['a@x.test', 'b@x.test'],
    organization: 'None',
    nameserver: ['ns1.x.test', 'ns2.x.test'],
    scan_date: 1714571102,
    ...overrides,
  };
}

function makeWebscan(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    url: 'https://login.evil.com/index.php',
    htmltitle: 'Sign in',
    ip: '203.0.113.7',
    ssl: { issuer: 'Test CA', sans: ['a', 'b', 'c'], wildcard: true },
    geoip: { country: 'NL', latitude: '52.1' },
    scan_date: '2024-05-01T00:00:00Z',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('normalizeRecord — whois', () => {
  it('defangs the domain', () => {
    const record = { datasource: 'whois', domain: 'evil.example.com' };
    const normalized = normalizeRecord(record, classify(record));
    expect(normalized.dataType).toBe('whois');
    if (normalized.dataType !== 'whois') return;
    expect(normalized.defangedDomain).toBe('evil[.]example[.]com');
  });

  it('formats present date fields only', () => {
    const normalized = normalizeRecord(makeWhois(), 'whois');
    if (normalized.dataType !== 'whois') throw new Error('expected whois');
    expect(normalized.formatted).toEqual({
      created_formatted: '2024-01-15 10:00:00',
      scan_date_formatted: '2024-05-01 13:45:02',
    });
  });

  it('builds the display summary with N/A defaults', () => {
    const normalized = normalizeRecord(makeWhois(), 'whois');
    if (normalized.dataType !== 'whois') throw new Error('expected whois');
    expect(normalized.summary).toEqual({
      domain: 'evil.example.com',
      registrar: 'Example Registrar, Inc.',
      created: '2024-01-15T10:00:00Z',
      updated: NOT_AVAILABLE,
      expires: NOT_AVAILABLE,
      name: NOT_AVAILABLE,
      email: 'a@x.test, b@x.test',
      organization: NOT_AVAILABLE,
      nameserver: 'ns1.x.test, ns2.x.test',
      address: NOT_AVAILABLE,
      city: NOT_AVAILABLE,
      state: NOT_AVAILABLE,
      country: NOT_AVAILABLE,
      zipcode: NOT_AVAILABLE,
      scanDate: '1714571102',
    });
  });

  it('keeps an unparseable date as written', () => {
    const normalized = normalizeRecord(makeWhois({ expires: 'soon' }), 'whois');
    if (normalized.dataType !== 'whois') throw new Error('expected whois');
    expect(normalized.formatted.expires_formatted).toBe('soon');
  });

  it('does not mutate its input', () => {
    const record = makeWhois();
    const before = JSON.stringify(record);
    normalizeRecord(record, 'whois');
    expect(JSON.stringify(record)).toBe(before);
  });
});

describe('normalizeRecord — webscan', () => {
  it('derives the domain from the URL host', () => {
    const record = makeWebscan();
    const normalized = normalizeRecord(record, classify(record));
    if (normalized.dataType !== 'webscan') throw new Error('expected webscan');
    expect(normalized.defangedDomain).toBe('login[.]evil[.]com');
    expect(normalized.defangedUrl).toBe('hxxps://login[.]evil[.]com/index.php');
    expect(normalized.formatted).toEqual({ scan_date_formatted: '2024-05-01 00:00:00' });
    expect(normalized.rawRecord).toBe(record);
  });

  it('prefers an explicit domain field', () => {
    const normalized = normalizeRecord(makeWebscan({ domain: 'other.test' }), 'webscan');
    if (normalized.dataType !== 'webscan') throw new Error('expected webscan');
    expect(normalized.defangedDomain).toBe('other[.]test');
  });

  it('summarizes TLS and location data', () => {
    const normalized = normalizeRecord(makeWebscan(), 'webscan');
    if (normalized.dataType !== 'webscan') throw new Error('expected webscan');
    expect(normalized.ssl).toEqual({
      issuer: 'Test CA',
      expires: NOT_AVAILABLE,
      issued: NOT_AVAILABLE,
      sansCount: 3,
      wildcard: true,
    });
    expect(normalized.geoip).toEqual({
      country: 'NL',
      city: NOT_AVAILABLE,
      isp: NOT_AVAILABLE,
      asn: NOT_AVAILABLE,
      latitude: 52.1,
      longitude: 0,
    });
  });

  it('omits missing sub-objects', () => {
    const normalized = normalizeRecord({ url: 'http://x.test', htmltitle: 't' }, 'webscan');
    if (normalized.dataType !== 'webscan') throw new Error('expected webscan');
    expect(normalized.ssl).toBeUndefined();
    expect(normalized.geoip).toBeUndefined();
  });
});

describe('normalizeRecord — other types', () => {
  it('passes domain search records through unchanged', () => {
    const record = { host: 'a.b.com', asn_diversity: 3 };
    expect(classify(record)).toBe('domain_search');
    expect(normalizeRecord(record, 'domain_search')).toEqual({
      dataType: 'domain_search',
      fields: { host: 'a.b.com', asn_diversity: 3 },
    });
  });

  it('wraps unknown records as generic', () => {
    expect(normalizeRecord({ foo: 1 }, 'unknown')).toEqual({ dataType: 'generic', rawData: { foo: 1 } });
  });

  it('wraps non-mapping input as generic', () => {
    expect(normalizeRecord('oops', 'whois')).toEqual({ dataType: 'generic', rawData: 'oops' });
  });
});

describe('summaries', () => {
  it('uses sans_count when no SAN list is present', () => {
    expect(summarizeSsl({ sans_count: '7' })?.sansCount).toBe(7);
  });

  it('returns undefined for non-mapping input', () => {
    expect(summarizeSsl('x')).toBeUndefined();
    expect(summarizeGeoIp(null)).toBeUndefined();
  });
});
