/**
 * Record normalizer — turns classified platform records into the
 * template-ready variants of `NormalizedRecord`.
 *
 * Inputs are never mutated. Missing fields degrade to "N/A" and date
 * parsing falls back to the raw string, so a malformed record still
 * yields an entry.
 */

import { defangDomain, defangUrl } from '../utils/defang.js';
import { formatTimestamp } from '../utils/dates.js';
import { isRawRecord } from './classifier.js';
import type {
  ClassifiedType,
  DomainSearchRecord,
  GenericRecord,
  GeoIpSummary,
  MessageRecord,
  NormalizedRecord,
  RawRecord,
  SslSummary,
  WebscanRecord,
  WhoisRecord,
  WhoisSummary,
} from '../types/records.js';

export const NOT_AVAILABLE = 'N/A';

const WHOIS_DATE_FIELDS = [
  'creation_date',
  'expiration_date',
  'created',
  'expires',
  'updated',
  'scan_date',
];

const WEBSCAN_DATE_FIELDS = ['scan_date'];

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

function text(value: unknown, fallback = NOT_AVAILABLE): string {
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  try {
    return JSON.stringify(value) ?? fallback;
  } catch {
    return String(value);
  }
}

function joined(value: unknown): string {
  if (Array.isArray(value)) {
    const parts = value.filter((v) => v !== null && v !== undefined).map((v) => text(v, ''));
    return parts.length > 0 ? parts.join(', ') : NOT_AVAILABLE;
  }
  return text(value);
}

function numeric(value: unknown, fallback = 0): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

function formatDates(record: RawRecord, fields: readonly string[]): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const field of fields) {
    const value = record[field];
    if (value === undefined || value === null) continue;
    formatted[`${field}_formatted`] = formatTimestamp(value);
  }
  return formatted;
}

function hostOf(url: string): string {
  const match = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/([^/?#]*)/.exec(url);
  if (!match) return '';
  // Strip userinfo and port
  return match[1].replace(/^.*@/, '').replace(/:\d+$/, '');
}

// ---------------------------------------------------------------------------
// Per-type normalization
// ---------------------------------------------------------------------------

function summarizeWhois(record: RawRecord): WhoisSummary {
  const organization = record.organization === 'None' ? undefined : record.organization;
  return {
    domain: text(record.domain),
    registrar: text(record.registrar),
    created: text(record.created),
    updated: text(record.updated),
    expires: text(record.expires),
    name: text(record.name),
    email: joined(record.email),
    organization: text(organization),
    nameserver: joined(record.nameserver),
    address: joined(record.address),
    city: text(record.city),
    state: text(record.state),
    country: text(record.country),
    zipcode: text(record.zipcode),
    scanDate: text(record.scan_date),
  };
}

function normalizeWhois(record: RawRecord): WhoisRecord {
  return {
    dataType: 'whois',
    fields: { ...record },
    defangedDomain: defangDomain(typeof record.domain === 'string' ? record.domain : ''),
    formatted: formatDates(record, WHOIS_DATE_FIELDS),
    summary: summarizeWhois(record),
  };
}

export function summarizeSsl(value: unknown): SslSummary | undefined {
  if (!isRawRecord(value)) return undefined;
  const sans = value.sans;
  return {
    issuer: text(value.issuer),
    expires: text(value.expires),
    issued: text(value.issued),
    sansCount: Array.isArray(sans) ? sans.length : numeric(value.sans_count),
    wildcard: value.wildcard === true,
  };
}

export function summarizeGeoIp(value: unknown): GeoIpSummary | undefined {
  if (!isRawRecord(value)) return undefined;
  return {
    country: text(value.country),
    city: text(value.city),
    isp: text(value.isp),
    asn: text(value.asn),
    latitude: numeric(value.latitude),
    longitude: numeric(value.longitude),
  };
}

function normalizeWebscan(record: RawRecord): WebscanRecord {
  const url = typeof record.url === 'string' ? record.url : '';
  const domain = typeof record.domain === 'string' && record.domain ? record.domain : hostOf(url);

  const normalized: WebscanRecord = {
    dataType: 'webscan',
    fields: { ...record },
    defangedDomain: defangDomain(domain),
    defangedUrl: defangUrl(url),
    formatted: formatDates(record, WEBSCAN_DATE_FIELDS),
    rawRecord: record,
  };

  const ssl = summarizeSsl(record.ssl);
  if (ssl) normalized.ssl = ssl;

  const geoip = summarizeGeoIp(record.geoip);
  if (geoip) normalized.geoip = geoip;

  return normalized;
}

function passthroughDomainSearch(record: RawRecord): DomainSearchRecord {
  return { dataType: 'domain_search', fields: { ...record } };
}

export function genericRecord(rawData: unknown): GenericRecord {
  return { dataType: 'generic', rawData };
}

export function messageRecord(message: string): MessageRecord {
  return { dataType: 'message', message };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Normalize a record according to its classified type.
 */
export function normalizeRecord(record: unknown, dataType: ClassifiedType): NormalizedRecord {
  if (!isRawRecord(record)) return genericRecord(record);

  switch (dataType) {
    case 'whois':
      return normalizeWhois(record);
    case 'webscan':
      return normalizeWebscan(record);
    case 'domain_search':
      return passthroughDomainSearch(record);
    case 'generic':
    case 'unknown':
      return genericRecord(record);
  }
}
