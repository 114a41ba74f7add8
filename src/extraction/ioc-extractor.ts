/**
 * IOC Extractor — collects indicator values from platform results.
 *
 * Each platform has its own field layout:
 *   urlscan:    page.{domain, ip, url, title, server}, task.{uuid, time}
 *   silentpush: flat identifiers plus nested whois/records/webscan/dns
 *               sub-objects, optionally inside the response envelope
 *
 * Values land in sets, so a value seen in many records is kept once. The
 * row form keeps the scan identifier each value was seen under.
 */

import { isRawRecord } from '../normalization/classifier.js';
import { extractRecords } from '../normalization/envelope.js';
import { IOC_KINDS, type IocKind, type IocSet, type SerializedIocs } from '../types/ioc.js';
import type { Platform } from '../types/config.js';
import type { RawRecord } from '../types/records.js';

export interface IocRow {
  type: IocKind;
  value: string;
  scanId: string;
}

type AddFn = (kind: IocKind, value: unknown, scanId: string) => void;

// Placeholder values platforms use for "absent"
const PLACEHOLDERS = new Set(['', 'N/A', 'None', 'null']);

// ---------------------------------------------------------------------------
// Set helpers
// ---------------------------------------------------------------------------

export function createIocSet(): IocSet {
  return {
    domains: new Set(),
    ips: new Set(),
    urls: new Set(),
    scanIds: new Set(),
    scanDates: new Set(),
    pageTitles: new Set(),
    serverDetails: new Set(),
    emails: new Set(),
    registrars: new Set(),
    nameservers: new Set(),
    organizations: new Set(),
  };
}

/**
 * Union of any number of IOC sets. Inputs are left untouched.
 */
export function mergeIocSets(...sets: IocSet[]): IocSet {
  const merged = createIocSet();
  for (const set of sets) {
    for (const kind of IOC_KINDS) {
      for (const value of set[kind]) {
        merged[kind].add(value);
      }
    }
  }
  return merged;
}

/**
 * Sorted arrays for every kind, empty kinds included.
 */
export function toSerializableIocs(set: IocSet): SerializedIocs {
  const sorted = (values: Set<string>): string[] => [...values].sort();
  return {
    domains: sorted(set.domains),
    ips: sorted(set.ips),
    urls: sorted(set.urls),
    scanIds: sorted(set.scanIds),
    scanDates: sorted(set.scanDates),
    pageTitles: sorted(set.pageTitles),
    serverDetails: sorted(set.serverDetails),
    emails: sorted(set.emails),
    registrars: sorted(set.registrars),
    nameservers: sorted(set.nameservers),
    organizations: sorted(set.organizations),
  };
}

export function countIocs(set: IocSet): number {
  return IOC_KINDS.reduce((total, kind) => total + set[kind].size, 0);
}

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------

function cleanValue(value: unknown): string | null {
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return PLACEHOLDERS.has(trimmed) ? null : trimmed;
}

function addEach(add: AddFn, kind: IocKind, value: unknown, scanId: string): void {
  if (Array.isArray(value)) {
    for (const item of value) add(kind, item, scanId);
  } else {
    add(kind, value, scanId);
  }
}

function sub(record: RawRecord, key: string): RawRecord | null {
  const value = record[key];
  return isRawRecord(value) ? value : null;
}

function recordList(results: unknown): RawRecord[] {
  const extraction = extractRecords(results);
  if (extraction.kind === 'message') return [];
  return extraction.records.filter(isRawRecord);
}

// ---------------------------------------------------------------------------
// Platform walkers
// ---------------------------------------------------------------------------

function walkUrlscan(results: unknown, add: AddFn): void {
  for (const record of recordList(results)) {
    const task = sub(record, 'task');
    const page = sub(record, 'page');
    const scanId = cleanValue(task?.uuid) ?? '';

    if (task) {
      add('scanIds', task.uuid, scanId);
      add('scanDates', task.time, scanId);
    }
    if (page) {
      add('domains', page.domain, scanId);
      add('ips', page.ip, scanId);
      add('urls', page.url, scanId);
      add('pageTitles', page.title, scanId);
      add('serverDetails', page.server, scanId);
    }
  }
}

function walkSilentPush(results: unknown, add: AddFn): void {
  for (const record of recordList(results)) {
    const scanId = cleanValue(record.request_id) ?? cleanValue(record.uuid) ?? '';

    add('scanIds', scanId, scanId);
    add('scanDates', record.scan_date, scanId);
    add('domains', record.domain ?? record.host, scanId);

    // Flat WHOIS layout
    add('registrars', record.registrar, scanId);
    addEach(add, 'nameservers', record.nameserver ?? record.nameservers, scanId);
    addEach(add, 'emails', record.email ?? record.emails, scanId);
    add('organizations', record.organization, scanId);

    const whois = sub(record, 'whois');
    if (whois) {
      add('registrars', whois.registrar, scanId);
      addEach(add, 'nameservers', whois.nameservers, scanId);
      addEach(add, 'emails', whois.emails, scanId);
    }

    const contacts = record.records;
    if (Array.isArray(contacts)) {
      for (const contact of contacts.filter(isRawRecord)) {
        addEach(add, 'emails', contact.email, scanId);
        add('organizations', contact.organization, scanId);
      }
    }

    const webscan = sub(record, 'webscan');
    if (webscan) {
      add('pageTitles', webscan.title, scanId);
      add('serverDetails', webscan.server, scanId);
      add('urls', webscan.url, scanId);
    }
    add('pageTitles', record.htmltitle, scanId);

    add('ips', record.ip, scanId);
    addEach(add, 'ips', record.ips, scanId);

    const dns = sub(record, 'dns');
    if (dns) {
      addEach(add, 'ips', dns.a, scanId);
      addEach(add, 'nameservers', dns.ns, scanId);
    }

    add('urls', record.url, scanId);
  }
}

function walk(platform: Platform, results: unknown, add: AddFn): void {
  switch (platform) {
    case 'urlscan':
      walkUrlscan(results, add);
      break;
    case 'silentpush':
      walkSilentPush(results, add);
      break;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function extractIocs(platform: Platform, results: unknown): IocSet {
  const set = createIocSet();
  walk(platform, results, (kind, value) => {
    const clean = cleanValue(value);
    if (clean !== null) set[kind].add(clean);
  });
  return set;
}

export function extractUrlscanIocs(results: unknown): IocSet {
  return extractIocs('urlscan', results);
}

export function extractSilentPushIocs(results: unknown): IocSet {
  return extractIocs('silentpush', results);
}

/**
 * Distinct (type, value, scan id) rows, in the order first seen.
 */
export function extractIocRows(platform: Platform, results: unknown): IocRow[] {
  const rows: IocRow[] = [];
  const seen = new Set<string>();
  walk(platform, results, (kind, value, scanId) => {
    const clean = cleanValue(value);
    if (clean === null) return;
    const key = `${kind}\u0000${clean}\u0000${scanId}`;
    if (seen.has(key)) return;
    seen.add(key);
    rows.push({ type: kind, value: clean, scanId });
  });
  return rows;
}
