/**
 * Record classifier for intelligence-platform results.
 *
 * Signals are checked in a fixed order and the first match wins:
 *   1. non-mapping input → unknown
 *   2. an explicit `datasource` hint
 *   3. structural fingerprints (field combinations)
 *   4. keyword scoring over field names
 */

import type { ClassifiedType, RawRecord } from '../types/records.js';

// ---------------------------------------------------------------------------
// Keyword indicators for the scoring fallback
// ---------------------------------------------------------------------------

const WEBSCAN_INDICATORS = ['favicon', 'html', 'header', 'body_analysis', 'ssl'];
const WHOIS_INDICATORS = ['registrar', 'nameserver', 'emails'];

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function has(record: RawRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

function fromDatasource(value: unknown): ClassifiedType | null {
  if (typeof value !== 'string') return null;
  switch (value.trim().toLowerCase()) {
    case 'webscan':
    case 'torscan':
      return 'webscan';
    case 'whois':
      return 'whois';
    default:
      return null;
  }
}

function fromStructure(record: RawRecord): ClassifiedType | null {
  if (has(record, 'host') && (has(record, 'asn_diversity') || has(record, 'ip_diversity_all'))) {
    return 'domain_search';
  }
  if (
    has(record, 'registrar') &&
    has(record, 'domain') &&
    (has(record, 'name') || has(record, 'organization'))
  ) {
    return 'whois';
  }
  if (has(record, 'url') && has(record, 'html_body_sha256')) {
    return 'webscan';
  }
  if (has(record, 'url') && has(record, 'htmltitle')) {
    return 'webscan';
  }
  if (has(record, 'domain') && has(record, 'scan_date') && has(record, 'created')) {
    return 'whois';
  }
  return null;
}

/**
 * Count field names that contain any indicator substring. Each field
 * counts at most once.
 */
export function scoreFields(record: RawRecord, indicators: readonly string[]): number {
  let score = 0;
  for (const key of Object.keys(record)) {
    const lower = key.toLowerCase();
    if (indicators.some((indicator) => lower.includes(indicator))) {
      score++;
    }
  }
  return score;
}

function fromKeywords(record: RawRecord): ClassifiedType {
  const webscan = scoreFields(record, WEBSCAN_INDICATORS);
  const whois = scoreFields(record, WHOIS_INDICATORS);
  if (webscan > whois) return 'webscan';
  if (whois > webscan) return 'whois';
  return 'unknown';
}

/**
 * Assign a data type to a platform record. Total and deterministic.
 */
export function classify(record: unknown): ClassifiedType {
  if (!isRawRecord(record)) return 'unknown';
  return fromDatasource(record.datasource) ?? fromStructure(record) ?? fromKeywords(record);
}
