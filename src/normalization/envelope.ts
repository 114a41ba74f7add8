/**
 * Record-list extraction from platform responses.
 *
 * Results arrive either as a flat list of records or wrapped in the
 * intelligence platform's `{response: {response: {scandata_raw: [...]}}}`
 * envelope. Anything else yields a human-readable message instead.
 */

import { isRawRecord } from './classifier.js';

export const NO_RECORDS_MESSAGE = 'No valid records found in the platform response.';
export const NO_RECORD_LIST_MESSAGE =
  'The platform response does not contain a list of scan records.';
export const UNEXPECTED_ENVELOPE_MESSAGE =
  'The platform response does not match the expected response structure.';
export const UNRECOGNIZED_FORMAT_MESSAGE =
  'Unrecognized result format: expected a list of records or a response envelope.';

export type RecordExtraction =
  | { kind: 'records'; records: unknown[] }
  | { kind: 'message'; message: string };

export function extractRecords(results: unknown): RecordExtraction {
  if (Array.isArray(results)) {
    return { kind: 'records', records: results };
  }

  if (!isRawRecord(results) || !('response' in results)) {
    return { kind: 'message', message: UNRECOGNIZED_FORMAT_MESSAGE };
  }

  const outer = results.response;
  if (!isRawRecord(outer) || !isRawRecord(outer.response) || !('scandata_raw' in outer.response)) {
    return { kind: 'message', message: UNEXPECTED_ENVELOPE_MESSAGE };
  }

  const list = outer.response.scandata_raw;
  if (!Array.isArray(list)) {
    return { kind: 'message', message: NO_RECORD_LIST_MESSAGE };
  }

  const records = list.filter(isRawRecord);
  if (records.length === 0) {
    return { kind: 'message', message: NO_RECORDS_MESSAGE };
  }
  return { kind: 'records', records };
}
