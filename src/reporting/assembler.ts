/**
 * Report assembler.
 *
 * Turns raw platform results into renderable reports: records are
 * classified and normalized (or defanged, for web-scan results), metadata
 * is filtered by TLP, and group reports flatten the results of every
 * member query in declaration order.
 */

import { classify, isRawRecord } from '../normalization/classifier.js';
import { genericRecord, messageRecord, normalizeRecord } from '../normalization/normalizer.js';
import { extractRecords } from '../normalization/envelope.js';
import { resolveGroup, type GroupMember } from '../config/groups.js';
import { highestTlpLevel, isVisible } from '../tlp/lattice.js';
import { defangDomain, defangUrl } from '../utils/defang.js';
import { createLogger } from '../utils/logger.js';
import type {
  Platform,
  QueryConfig,
  QueryEntry,
  QueryGroupConfig,
  TlpLabeledItem,
  TlpLevel,
} from '../types/config.js';
import type { NormalizedRecord, RawRecord, ReportEntry, UrlscanResult } from '../types/records.js';

const logger = createLogger('assembler');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface ReportMetadata {
  title: string;
  description?: string;
  queryString?: string;
  notes: string[];
  references: string[];
  tags: string[];
  frequency?: string;
  priority?: string;
}

export interface QueryReport {
  kind: 'query';
  name: string;
  platform: Platform;
  tlpLevel: TlpLevel;
  metadata: ReportMetadata;
  entries: ReportEntry[];
  /** Entries other than synthetic messages. */
  resultsCount: number;
}

export interface GroupSection {
  name: string;
  type: 'query' | 'query_group';
  platform?: Platform;
  description?: string;
  resultsCount: number;
}

export interface GroupReport {
  kind: 'query_group';
  name: string;
  tlpLevel: TlpLevel;
  metadata: ReportMetadata;
  entries: ReportEntry[];
  sections: GroupSection[];
  resultsCount: number;
}

export type AssembledReport = QueryReport | GroupReport;

export interface QueryReportInput {
  name: string;
  query: QueryConfig;
  results: unknown;
  reportTlp: TlpLevel;
}

export interface GroupReportInput {
  name: string;
  queries: Record<string, QueryEntry>;
  /** Raw results keyed by leaf query name. */
  results: Record<string, unknown>;
  reportTlp: TlpLevel;
}

export function defaultTitle(name: string): string {
  return `Scan Monitor Report - ${name}`;
}

// ---------------------------------------------------------------------------
// Per-platform processing
// ---------------------------------------------------------------------------

function toNormalized(record: unknown): NormalizedRecord {
  try {
    return normalizeRecord(record, classify(record));
  } catch (err) {
    logger.warn(
      `Falling back to raw data for a record: ${err instanceof Error ? err.message : String(err)}`,
    );
    return genericRecord(record);
  }
}

function stringField(record: RawRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Prepare one web-scan search result for display.
 */
export function toUrlscanResult(record: RawRecord): UrlscanResult {
  const page: RawRecord = isRawRecord(record.page) ? record.page : {};
  const task: RawRecord = isRawRecord(record.task) ? record.task : {};
  const uuid = stringField(task, 'uuid');

  const entry: UrlscanResult = {
    dataType: 'urlscan_result',
    fields: { ...record },
    defangedUrl: defangUrl(stringField(page, 'url')),
    defangedDomain: defangDomain(stringField(page, 'domain')),
  };
  if (uuid) {
    entry.scanId = uuid;
    entry.localScreenshot = `images/${uuid}.png`;
  }
  return entry;
}

/**
 * Classify and normalize the results of a single query.
 */
export function processResults(platform: Platform, results: unknown): ReportEntry[] {
  const extraction = extractRecords(results);
  if (extraction.kind === 'message') {
    return [messageRecord(extraction.message)];
  }

  if (platform === 'urlscan') {
    return extraction.records.map((record) =>
      isRawRecord(record) ? toUrlscanResult(record) : genericRecord(record),
    );
  }
  return extraction.records.map(toNormalized);
}

export function countResults(entries: readonly ReportEntry[]): number {
  return entries.filter((entry) => entry.dataType !== 'message').length;
}

// ---------------------------------------------------------------------------
// Metadata resolution
// ---------------------------------------------------------------------------

/**
 * Values of the items visible at `reportTlp`, in their original order. An
 * item without a level takes the container default, then the report level.
 */
export function visibleValues(
  items: readonly TlpLabeledItem[],
  containerDefault: TlpLevel | undefined,
  reportTlp: TlpLevel,
): string[] {
  return items
    .filter((item) => isVisible(item.tlpLevel ?? containerDefault ?? reportTlp, reportTlp))
    .map((item) => item.value);
}

function visibleScalar(
  value: string | undefined,
  level: TlpLevel | undefined,
  reportTlp: TlpLevel,
): string | undefined {
  if (value === undefined || value === '') return undefined;
  return isVisible(level ?? reportTlp, reportTlp) ? value : undefined;
}

export function resolveMetadata(
  name: string,
  entry: QueryConfig | QueryGroupConfig,
  reportTlp: TlpLevel,
): ReportMetadata {
  const containerDefault = entry.defaultTlpLevel;
  const titles = visibleValues(entry.titles, containerDefault, reportTlp);

  const metadata: ReportMetadata = {
    title: titles[0] ?? defaultTitle(name),
    notes: visibleValues(entry.notes, containerDefault, reportTlp),
    references: visibleValues(entry.references, containerDefault, reportTlp),
    tags: visibleValues(entry.tags, entry.tagsTlpLevel ?? containerDefault, reportTlp),
  };

  const description = visibleScalar(
    entry.description,
    entry.descriptionTlpLevel ?? containerDefault,
    reportTlp,
  );
  if (description) metadata.description = description;

  if (entry.type === 'query') {
    const queryString = visibleScalar(
      entry.query,
      entry.queryTlpLevel ?? containerDefault,
      reportTlp,
    );
    if (queryString) metadata.queryString = queryString;

    const frequency = visibleScalar(
      entry.frequency,
      entry.frequencyTlpLevel ?? containerDefault,
      reportTlp,
    );
    if (frequency) metadata.frequency = frequency;

    const priority = visibleScalar(
      entry.priority,
      entry.priorityTlpLevel ?? containerDefault,
      reportTlp,
    );
    if (priority) metadata.priority = priority;
  }

  return metadata;
}

/**
 * The most restrictive level any metadata item of `entry` is labeled with:
 * the level a report needs to show all of it.
 */
export function highestMetadataTlp(entry: QueryEntry): TlpLevel {
  const items = [...entry.titles, ...entry.notes, ...entry.references, ...entry.tags];
  const levels = [
    ...items.map((item) => item.tlpLevel),
    entry.defaultTlpLevel,
    entry.descriptionTlpLevel,
    entry.tagsTlpLevel,
  ];
  if (entry.type === 'query') {
    levels.push(entry.queryTlpLevel, entry.frequencyTlpLevel, entry.priorityTlpLevel);
  }
  return highestTlpLevel(levels);
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

export function assembleQueryReport(input: QueryReportInput): QueryReport {
  const { name, query, results, reportTlp } = input;
  const entries = processResults(query.platform, results);

  return {
    kind: 'query',
    name,
    platform: query.platform,
    tlpLevel: reportTlp,
    metadata: resolveMetadata(name, query, reportTlp),
    entries,
    resultsCount: countResults(entries),
  };
}

/**
 * Append a member's entries to `flattened` and return how many real
 * results it contributed.
 */
function flattenMember(
  member: GroupMember,
  results: Record<string, unknown>,
  flattened: ReportEntry[],
): number {
  if (member.type === 'query_group') {
    return member.members.reduce(
      (total, child) => total + flattenMember(child, results, flattened),
      0,
    );
  }

  const entries = processResults(member.config.platform, results[member.name] ?? []);
  for (const entry of entries) {
    flattened.push({ ...entry, sourceQuery: member.name });
  }
  return countResults(entries);
}

export function assembleGroupReport(input: GroupReportInput): GroupReport {
  const { name, queries, results, reportTlp } = input;
  const group = resolveGroup(queries, name);

  const entries: ReportEntry[] = [];
  const sections: GroupSection[] = [];

  for (const member of group.members) {
    const resultsCount = flattenMember(member, results, entries);
    const section: GroupSection = { name: member.name, type: member.type, resultsCount };
    if (member.type === 'query') section.platform = member.config.platform;
    if (member.config.description) section.description = member.config.description;
    sections.push(section);
  }

  logger.debug(`Assembled group '${name}' with ${entries.length} entries`);

  return {
    kind: 'query_group',
    name,
    tlpLevel: reportTlp,
    metadata: resolveMetadata(name, group.config, reportTlp),
    entries,
    sections,
    resultsCount: sections.reduce((total, s) => total + s.resultsCount, 0),
  };
}

// ---------------------------------------------------------------------------
// File naming
// ---------------------------------------------------------------------------

/**
 * The timestamp segment of a run directory: whatever follows `<name>_`
 * (or the first underscore when the directory does not start with the
 * name).
 */
export function runDirSuffix(name: string, runDirName: string): string {
  if (runDirName.startsWith(`${name}_`)) {
    return runDirName.substring(name.length + 1);
  }
  const cut = runDirName.indexOf('_');
  return cut === -1 ? '' : runDirName.substring(cut + 1);
}

export function reportFilename(name: string, runDirName: string, tlp: TlpLevel): string {
  return `report_${name}_${runDirSuffix(name, runDirName)}_TLP-${tlp}.html`;
}
