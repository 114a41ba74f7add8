/**
 * Monitor — runs configured queries and query groups end to end.
 *
 * A query run searches its platform, caches the raw results, downloads
 * screenshots, renders the HTML report, exports IOCs, records `last_run`
 * and starts the configured extensions. A group run does that for every
 * leaf query, then builds one combined report in its own directory.
 *
 * Output layout per run:
 *   <output>/<name>_<YYYYMMDD_HHMMSS>[_group|_test]/
 *     images/            screenshots
 *     iocs/              IOC exports
 *     results.json       raw platform results
 *     report_<name>_<timestamp>_TLP-<level>.html
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { leafQueries, resolveGroup } from '../config/groups.js';
import { saveLastRun } from '../config/loader.js';
import { ConfigError } from '../errors.js';
import {
  countIocs,
  createIocSet,
  extractIocRows,
  extractIocs,
  mergeIocSets,
  type IocRow,
} from '../extraction/ioc-extractor.js';
import { writeIocFiles } from '../extraction/ioc-writer.js';
import { isRawRecord } from '../normalization/classifier.js';
import { extractRecords } from '../normalization/envelope.js';
import { TemplateRegistry } from '../normalization/template-registry.js';
import {
  assembleGroupReport,
  assembleQueryReport,
  highestMetadataTlp,
  type AssembledReport,
} from '../reporting/assembler.js';
import { HtmlReporter } from '../reporting/html-reporter.js';
import { copyScreenshots } from '../reporting/screenshots.js';
import type { RunSummary } from '../reporting/summary-reporter.js';
import { determineReportLevel } from '../tlp/lattice.js';
import { displayTimestamp, runTimestamp } from '../utils/dates.js';
import { createLogger } from '../utils/logger.js';
import { applyDateFilter, searchWindowStart } from './date-filter.js';
import { runExtensions } from './extensions.js';
import type { PlatformClient, ScreenshotSource } from '../clients/types.js';
import type { IocSet } from '../types/ioc.js';
import type {
  MonitorConfig,
  Platform,
  QueryConfig,
  QueryEntry,
  TlpLevel,
} from '../types/config.js';

const logger = createLogger('monitor');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface MonitorDeps {
  clients: Partial<Record<Platform, PlatformClient>>;
  /** Source of web-scan screenshots; none are downloaded without it. */
  screenshots?: ScreenshotSource;
  registry?: TemplateRegistry;
  templatesDir?: string;
  /** Config file that receives `last_run` updates. */
  configPath?: string;
  now?: () => Date;
}

export interface RunOptions {
  /** Limit results to the last N days. */
  days?: number;
  /** Requested report TLP level. */
  tlp?: string;
  /** Start configured extensions after the run. Default: true */
  extensions?: boolean;
}

export interface RunResult extends RunSummary {
  /** Raw platform results: a list or envelope for a query, a map by leaf name for a group. */
  results: unknown;
}

export interface QueryListing {
  name: string;
  type: 'query' | 'query_group';
  platform?: Platform;
  description: string;
  /** Level needed to show every metadata item. */
  highestTlp: TlpLevel;
}

interface RunDirectory {
  path: string;
  name: string;
  imagesDir: string;
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export class Monitor {
  private readonly config: MonitorConfig;
  private readonly deps: MonitorDeps;
  private readonly reporter: HtmlReporter;
  private readonly now: () => Date;

  constructor(config: MonitorConfig, deps: MonitorDeps) {
    this.config = config;
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.reporter = new HtmlReporter({
      registry: deps.registry ?? new TemplateRegistry(),
      templatesDir: deps.templatesDir,
      username: config.reportUsername,
      now: this.now,
    });
  }

  listQueries(): QueryListing[] {
    return Object.entries(this.config.queries).map(([name, entry]) => {
      const listing: QueryListing = {
        name,
        type: entry.type,
        description: entry.description ?? 'No description',
        highestTlp: highestMetadataTlp(entry),
      };
      if (entry.type === 'query') listing.platform = entry.platform;
      return listing;
    });
  }

  /**
   * The query string sent to the platform, date filter included.
   */
  buildQueryString(query: QueryConfig, days?: number): string {
    const since = searchWindowStart({
      days,
      lastRun: query.lastRun,
      defaultDays: this.config.defaultDays,
      now: this.now(),
    });
    return applyDateFilter(query.platform, query.query, since);
  }

  /**
   * Run a query or group by name.
   */
  async run(name: string, options: RunOptions = {}): Promise<RunResult> {
    const entry = this.lookup(name);
    return entry.type === 'query_group'
      ? this.runGroup(name, options)
      : this.runQuery(name, options);
  }

  /**
   * Run every standalone query. A failing query is logged and the rest
   * still run.
   */
  async runAll(options: RunOptions = {}): Promise<RunResult[]> {
    const runs: RunResult[] = [];
    for (const [name, entry] of Object.entries(this.config.queries)) {
      if (entry.type !== 'query') continue;
      try {
        runs.push(await this.runQuery(name, options));
      } catch (err) {
        logger.error(`Query '${name}' failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return runs;
  }

  async runQuery(name: string, options: RunOptions = {}): Promise<RunResult> {
    const started = Date.now();
    const query = this.lookup(name);
    if (query.type !== 'query') {
      throw new ConfigError(`'${name}' is a query group; run it as a group`);
    }

    const client = this.deps.clients[query.platform];
    if (!client) {
      throw new ConfigError(`No client configured for platform '${query.platform}'`);
    }

    const reportTlp = this.reportLevel(query, options.tlp);
    const queryString = this.buildQueryString(query, options.days);
    logger.info(`Running query '${name}' on ${query.platform}: ${queryString}`);

    const results = await client.search(queryString, query.endpoint);
    const dir = this.createRunDirectory(name);
    this.writeResultsCache(dir, results);

    const screenshots = query.platform === 'urlscan'
      ? await this.downloadScreenshots(results, dir.imagesDir)
      : 0;

    const report = assembleQueryReport({ name, query, results, reportTlp });
    const reportPath = await this.writeReport(report, dir, query.templatePath);

    const iocs = extractIocs(query.platform, results);
    writeIocFiles(join(dir.path, 'iocs'), name, iocs, extractIocRows(query.platform, results));

    this.recordLastRun(name);
    if (options.extensions ?? true) {
      await runExtensions(this.config.extensions, dir.path);
    }

    return {
      name,
      kind: 'query',
      tlpLevel: reportTlp,
      runDir: dir.path,
      reportPath,
      resultsCount: report.resultsCount,
      iocCount: countIocs(iocs),
      screenshots,
      durationMs: Date.now() - started,
      results,
    };
  }

  async runGroup(name: string, options: RunOptions = {}): Promise<RunResult> {
    const started = Date.now();
    const group = resolveGroup(this.config.queries, name);
    const reportTlp = this.reportLevel(group.config, options.tlp);
    const leaves = leafQueries(group);
    logger.info(`Running query group '${name}' with ${leaves.length} queries`);

    const results: Record<string, unknown> = {};
    const imageDirs = new Map<string, string>();
    for (const leaf of leaves) {
      const run = await this.runQuery(leaf.name, { ...options, extensions: false });
      results[leaf.name] = run.results;
      imageDirs.set(leaf.name, join(run.runDir, 'images'));
    }

    const dir = this.createRunDirectory(name, 'group');
    this.writeResultsCache(dir, results);

    const report = assembleGroupReport({ name, queries: this.config.queries, results, reportTlp });
    const screenshots = copyScreenshots(report.entries, imageDirs, dir.imagesDir);
    const reportPath = await this.writeReport(report, dir, group.config.templatePath);

    const iocs = this.exportGroupIocs(name, dir, leaves.map((leaf) => ({
      platform: leaf.config.platform,
      results: results[leaf.name],
    })));

    this.recordLastRun(name);
    if (options.extensions ?? true) {
      await runExtensions(this.config.extensions, dir.path);
    }

    return {
      name,
      kind: 'query_group',
      tlpLevel: reportTlp,
      runDir: dir.path,
      reportPath,
      resultsCount: report.resultsCount,
      iocCount: countIocs(iocs),
      screenshots,
      durationMs: Date.now() - started,
      results,
    };
  }

  /**
   * Build a report from cached results without querying any platform.
   * For a group, `results` maps leaf query names to their results.
   */
  async reportFromResults(name: string, results: unknown, options: RunOptions = {}): Promise<RunResult> {
    const started = Date.now();
    const entry = this.lookup(name);
    const reportTlp = this.reportLevel(entry, options.tlp);
    const dir = this.createRunDirectory(name, 'test');
    logger.info(`Generating test report for '${name}' at TLP:${reportTlp.toUpperCase()}`);

    let report: AssembledReport;
    let iocs: IocSet;
    if (entry.type === 'query_group') {
      const byQuery = isRawRecord(results) ? results : {};
      report = assembleGroupReport({ name, queries: this.config.queries, results: byQuery, reportTlp });
      const leaves = leafQueries(resolveGroup(this.config.queries, name));
      iocs = this.exportGroupIocs(name, dir, leaves.map((leaf) => ({
        platform: leaf.config.platform,
        results: byQuery[leaf.name],
      })));
    } else {
      report = assembleQueryReport({ name, query: entry, results, reportTlp });
      iocs = extractIocs(entry.platform, results);
      writeIocFiles(join(dir.path, 'iocs'), name, iocs, extractIocRows(entry.platform, results));
    }

    const reportPath = await this.writeReport(report, dir, entry.templatePath);

    return {
      name,
      kind: 'test',
      tlpLevel: reportTlp,
      runDir: dir.path,
      reportPath,
      resultsCount: report.resultsCount,
      iocCount: countIocs(iocs),
      screenshots: 0,
      durationMs: Date.now() - started,
      results,
    };
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private lookup(name: string): QueryEntry {
    const { queries } = this.config;
    const entry = Object.hasOwn(queries, name) ? queries[name] : undefined;
    if (!entry) {
      throw new ConfigError(`Query '${name}' not found in configuration`);
    }
    return entry;
  }

  private reportLevel(entry: QueryEntry, requested: string | undefined): TlpLevel {
    const level = determineReportLevel(requested, entry.defaultTlpLevel, this.config.defaultTlpLevel);
    logger.debug(`Report TLP level: ${level}`);
    return level;
  }

  private createRunDirectory(name: string, suffix?: 'group' | 'test'): RunDirectory {
    const dirName = `${name}_${runTimestamp(this.now())}${suffix ? `_${suffix}` : ''}`;
    const path = join(this.config.outputDirectory, dirName);
    const imagesDir = join(path, 'images');
    mkdirSync(imagesDir, { recursive: true });
    return { path, name: dirName, imagesDir };
  }

  private writeResultsCache(dir: RunDirectory, results: unknown): void {
    writeFileSync(join(dir.path, 'results.json'), JSON.stringify(results, null, 2), 'utf-8');
  }

  private async downloadScreenshots(results: unknown, imagesDir: string): Promise<number> {
    const source = this.deps.screenshots;
    if (!source) return 0;

    const extraction = extractRecords(results);
    if (extraction.kind === 'message') return 0;

    let downloaded = 0;
    for (const record of extraction.records) {
      if (!isRawRecord(record) || !isRawRecord(record.task)) continue;
      const uuid = record.task.uuid;
      if (typeof uuid !== 'string' || uuid === '') continue;
      if (await source.downloadScreenshot(uuid, join(imagesDir, `${uuid}.png`))) {
        downloaded++;
      }
    }
    logger.debug(`Downloaded ${downloaded} screenshots`);
    return downloaded;
  }

  private writeReport(
    report: AssembledReport,
    dir: RunDirectory,
    templatePath: string | undefined,
  ): Promise<string> {
    const layoutPath = templatePath ?? this.config.defaultTemplatePath;
    return this.reporter.writeReport(report, dir.path, dir.name, { layoutPath });
  }

  private exportGroupIocs(
    name: string,
    dir: RunDirectory,
    members: ReadonlyArray<{ platform: Platform; results: unknown }>,
  ): IocSet {
    let merged = createIocSet();
    const rows: IocRow[] = [];
    const seen = new Set<string>();

    for (const member of members) {
      if (member.results === undefined) continue;
      merged = mergeIocSets(merged, extractIocs(member.platform, member.results));
      for (const row of extractIocRows(member.platform, member.results)) {
        const key = `${row.type}\u0000${row.value}\u0000${row.scanId}`;
        if (seen.has(key)) continue;
        seen.add(key);
        rows.push(row);
      }
    }

    writeIocFiles(join(dir.path, 'iocs'), name, merged, rows);
    return merged;
  }

  private recordLastRun(name: string): void {
    const timestamp = displayTimestamp(this.now());
    const { queries } = this.config;
    if (Object.hasOwn(queries, name)) queries[name].lastRun = timestamp;

    const { configPath } = this.deps;
    if (!configPath) return;
    try {
      saveLastRun(configPath, name, timestamp);
    } catch (err) {
      logger.warn(`Could not record last run for '${name}': ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
