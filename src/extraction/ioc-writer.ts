/**
 * IOC file export.
 *
 * Writes, for one query or group:
 *   <prefix>_iocs.csv       combined rows: ioc_type,value,scan_id
 *   <prefix>_<kind>.csv     one single-column file per non-empty kind
 *   <prefix>_iocs.json      every kind, empty kinds as []
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';

import { toSerializableIocs } from './ioc-extractor.js';
import type { IocRow } from './ioc-extractor.js';
import { IOC_COLUMN_NAMES, IOC_FILE_STEMS, IOC_KINDS, type IocSet } from '../types/ioc.js';

export interface IocExportResult {
  combinedCsv: string;
  perKindCsv: string[];
  json: string;
}

/**
 * Quote a CSV field when it holds a delimiter, quote, line break, or
 * surrounding whitespace.
 */
export function csvField(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function combinedCsv(rows: readonly IocRow[]): string {
  const lines = ['ioc_type,value,scan_id'];
  for (const row of rows) {
    lines.push(
      [IOC_COLUMN_NAMES[row.type], row.value, row.scanId].map(csvField).join(','),
    );
  }
  return lines.join('\n') + '\n';
}

export function singleColumnCsv(header: string, values: readonly string[]): string {
  return [header, ...values.map(csvField)].join('\n') + '\n';
}

/**
 * JSON form keyed by the file stems (`scan_ids`, `page_titles`, ...).
 */
export function iocJson(set: IocSet): string {
  const serialized = toSerializableIocs(set);
  const out: Record<string, string[]> = {};
  for (const kind of IOC_KINDS) {
    out[IOC_FILE_STEMS[kind]] = serialized[kind];
  }
  return JSON.stringify(out, null, 2);
}

/**
 * Write every IOC export for `prefix` into `dir`, creating it if needed.
 */
export function writeIocFiles(
  dir: string,
  prefix: string,
  set: IocSet,
  rows: readonly IocRow[],
): IocExportResult {
  mkdirSync(dir, { recursive: true });

  const combinedPath = join(dir, `${prefix}_iocs.csv`);
  writeFileSync(combinedPath, combinedCsv(rows), 'utf-8');

  const serialized = toSerializableIocs(set);
  const perKindCsv: string[] = [];
  for (const kind of IOC_KINDS) {
    if (serialized[kind].length === 0) continue;
    const path = join(dir, `${prefix}_${IOC_FILE_STEMS[kind]}.csv`);
    writeFileSync(path, singleColumnCsv(IOC_COLUMN_NAMES[kind], serialized[kind]), 'utf-8');
    perKindCsv.push(path);
  }

  const jsonPath = join(dir, `${prefix}_iocs.json`);
  writeFileSync(jsonPath, iocJson(set), 'utf-8');

  return { combinedCsv: combinedPath, perKindCsv, json: jsonPath };
}
