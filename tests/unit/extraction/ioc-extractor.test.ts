/**
 * Unit tests for IOC extraction from platform results.
 */

import { describe, it, expect } from 'vitest';
import {
  countIocs,
  createIocSet,
  extractIocRows,
  extractIocs,
  extractSilentPushIocs,
  extractUrlscanIocs,
  mergeIocSets,
  toSerializableIocs,
} from '@/extraction/ioc-extractor.js';
import { loadPlatformFixture } from '../../helpers/fixtures.js';

const urlscanResults = loadPlatformFixture('urlscan-search');
const silentPushEnvelope = loadPlatformFixture('silentpush-envelope');

// ---------------------------------------------------------------------------
// urlscan
// ---------------------------------------------------------------------------

describe('extractUrlscanIocs', () => {
  it('collects page and task fields, skipping placeholders', () => {
    expect(toSerializableIocs(extractUrlscanIocs(urlscanResults))).toEqual({
      domains: ['evil.test'],
      ips: ['203.0.113.7', '203.0.113.8'],
      urls: ['https://evil.test/', 'https://evil.test/login'],
      scanIds: ['uuid-1', 'uuid-2'],
      scanDates: ['2024-05-01T10:00:00.000Z', '2024-05-02T10:00:00.000Z'],
      pageTitles: ['Sign in'],
      serverDetails: ['nginx'],
      emails: [],
      registrars: [],
      nameservers: [],
      organizations: [],
    });
  });

  it('counts distinct values', () => {
    expect(countIocs(extractUrlscanIocs(urlscanResults))).toBe(11);
  });

  it('returns an empty set for unrecognized input', () => {
    expect(countIocs(extractUrlscanIocs({ unexpected: true }))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Silent Push
// ---------------------------------------------------------------------------

describe('extractSilentPushIocs', () => {
  it('walks flat and nested fields inside the envelope', () => {
    expect(toSerializableIocs(extractSilentPushIocs(silentPushEnvelope))).toEqual({
      domains: ['bad.test', 'other.test'],
      ips: ['198.51.100.1', '198.51.100.2', '198.51.100.9'],
      urls: ['http://bad.test/', 'http://other.test/x'],
      scanIds: ['req-1', 'u-2'],
      scanDates: ['2024-05-01 10:00:00'],
      pageTitles: ['Other', 'Welcome'],
      serverDetails: ['Apache'],
      emails: ['abuse@reg.test', 'jd@bad.test'],
      registrars: ['Reg A', 'Reg B'],
      nameservers: ['ns1.bad.test', 'ns2.bad.test', 'ns3.bad.test'],
      organizations: ['Bad Org'],
    });
  });

  it('accepts a flat record list', () => {
    const set = extractIocs('silentpush', [{ domain: 'flat.test', ips: ['192.0.2.1'] }]);
    expect([...set.domains]).toEqual(['flat.test']);
    expect([...set.ips]).toEqual(['192.0.2.1']);
  });

  it('does not collect contact names', () => {
    const set = extractSilentPushIocs([{ records: [{ name: 'J Doe' }] }]);
    expect(countIocs(set)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Rows and set helpers
// ---------------------------------------------------------------------------

describe('extractIocRows', () => {
  it('keeps the scan id each value was seen under', () => {
    const rows = extractIocRows('urlscan', urlscanResults);
    expect(rows[0]).toEqual({ type: 'scanIds', value: 'uuid-1', scanId: 'uuid-1' });
    expect(rows.filter((row) => row.type === 'domains')).toEqual([
      { type: 'domains', value: 'evil.test', scanId: 'uuid-1' },
      { type: 'domains', value: 'evil.test', scanId: 'uuid-2' },
    ]);
    expect(rows).toHaveLength(12);
  });

  it('drops repeated triples', () => {
    const record = { task: { uuid: 'u' }, page: { domain: 'a.test' } };
    expect(extractIocRows('urlscan', [record, record])).toEqual([
      { type: 'scanIds', value: 'u', scanId: 'u' },
      { type: 'domains', value: 'a.test', scanId: 'u' },
    ]);
  });
});

describe('mergeIocSets', () => {
  it('unions sets without modifying them', () => {
    const a = createIocSet();
    a.domains.add('a.test');
    const b = createIocSet();
    b.domains.add('b.test');
    b.domains.add('a.test');

    const merged = mergeIocSets(a, b);
    expect([...merged.domains].sort()).toEqual(['a.test', 'b.test']);
    expect(a.domains.size).toBe(1);
    expect(b.domains.size).toBe(2);
  });
});
