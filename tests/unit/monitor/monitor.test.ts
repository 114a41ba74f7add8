/**
 * Unit tests for the Monitor: query and group runs end to end against
 * in-process platform clients and a temporary output directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('@/monitor/extensions.js', () => ({
  runExtensions: vi.fn(async () => []),
}));

import { Monitor, type MonitorDeps } from '@/monitor/monitor.js';
import { runExtensions } from '@/monitor/extensions.js';
import { ConfigError } from '@/errors.js';
import type { PlatformClient, ScreenshotSource } from '@/clients/types.js';
import type { MonitorConfig } from '@/types/config.js';
import { loadPlatformFixture, makeGroup, makeQuery } from '../../helpers/fixtures.js';

const NOW = new Date(2024, 4, 1, 9, 5, 7);
const STAMP = '20240501_090507';

const urlscanResults = loadPlatformFixture('urlscan-search');
const silentPushEnvelope = loadPlatformFixture('silentpush-envelope');

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeClient(platform: PlatformClient['platform'], results: unknown) {
  return {
    platform,
    search: vi.fn(async (_query: string, _endpoint?: string): Promise<unknown> => results),
  };
}

const screenshots: ScreenshotSource = {
  downloadScreenshot: async (scanId, outputPath) => {
    writeFileSync(outputPath, `png:${scanId}`);
    return true;
  },
};

let workDir: string;
let outDir: string;
let urlscan: ReturnType<typeof makeClient>;
let silentpush: ReturnType<typeof makeClient>;

function makeConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    outputDirectory: outDir,
    reportUsername: 'analyst',
    extensions: [],
    queries: {
      kit: makeQuery({ description: 'Phishing kit pages' }),
      sp: makeQuery({ platform: 'silentpush', query: 'datasource = "whois"', defaultTlpLevel: 'green' }),
      both: makeGroup(['kit', 'sp'], { notes: [{ value: 'internal', tlpLevel: 'red' }] }),
    },
    ...overrides,
  };
}

function makeMonitor(config: MonitorConfig = makeConfig(), deps: Partial<MonitorDeps> = {}): Monitor {
  return new Monitor(config, {
    clients: { urlscan, silentpush },
    screenshots,
    now: () => NOW,
    ...deps,
  });
}

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'scanwatch-monitor-'));
  outDir = join(workDir, 'out');
  urlscan = makeClient('urlscan', urlscanResults);
  silentpush = makeClient('silentpush', silentPushEnvelope);
  vi.mocked(runExtensions).mockClear();
  for (const method of ['info', 'warn', 'error', 'debug'] as const) {
    vi.spyOn(console, method).mockImplementation(() => undefined);
  }
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Listing and query strings
// ---------------------------------------------------------------------------

describe('Monitor.listQueries', () => {
  it('describes every configured entry', () => {
    expect(makeMonitor().listQueries()).toEqual([
      { name: 'kit', type: 'query', platform: 'urlscan', description: 'Phishing kit pages', highestTlp: 'clear' },
      { name: 'sp', type: 'query', platform: 'silentpush', description: 'No description', highestTlp: 'green' },
      { name: 'both', type: 'query_group', description: 'No description', highestTlp: 'red' },
    ]);
  });
});

describe('Monitor.buildQueryString', () => {
  it('leaves the query unfiltered without a window', () => {
    expect(makeMonitor().buildQueryString(makeQuery())).toBe('page.domain:evil.test');
  });

  it('filters by the requested number of days', () => {
    expect(makeMonitor().buildQueryString(makeQuery(), 7)).toBe(
      'page.domain:evil.test AND date:>=2024-04-24',
    );
  });

  it('starts at the last run when no days are given', () => {
    const query = makeQuery({ platform: 'silentpush', query: 'q', lastRun: '2024-04-30 08:00:00' });
    expect(makeMonitor().buildQueryString(query)).toBe('q AND scan_date >= "2024-04-30 08:00:00"');
  });

  it('falls back to the configured default window', () => {
    const monitor = makeMonitor(makeConfig({ defaultDays: 1 }));
    expect(monitor.buildQueryString(makeQuery())).toBe('page.domain:evil.test AND date:>=2024-04-30');
  });
});

// ---------------------------------------------------------------------------
// Query runs
// ---------------------------------------------------------------------------

describe('Monitor.runQuery', () => {
  it('writes results, screenshots, the report and IOC exports', async () => {
    const run = await makeMonitor().run('kit');
    const runDir = join(outDir, `kit_${STAMP}`);

    expect(urlscan.search).toHaveBeenCalledWith('page.domain:evil.test', undefined);
    expect(run).toMatchObject({
      name: 'kit',
      kind: 'query',
      tlpLevel: 'clear',
      runDir,
      reportPath: join(runDir, `report_kit_${STAMP}_TLP-clear.html`),
      resultsCount: 3,
      iocCount: 11,
      screenshots: 2,
    });

    expect(JSON.parse(readFileSync(join(runDir, 'results.json'), 'utf-8'))).toEqual(urlscanResults);
    expect(readFileSync(join(runDir, 'images', 'uuid-1.png'), 'utf-8')).toBe('png:uuid-1');
    expect(existsSync(run.reportPath)).toBe(true);
    expect(existsSync(join(runDir, 'iocs', 'kit_iocs.csv'))).toBe(true);
    expect(existsSync(join(runDir, 'iocs', 'kit_iocs.json'))).toBe(true);
  });

  it('records the last run and starts extensions in the run directory', async () => {
    const config = makeConfig();
    await makeMonitor(config).runQuery('kit');

    expect(config.queries.kit.lastRun).toBe('2024-05-01 09:05:07');
    expect(runExtensions).toHaveBeenCalledWith([], join(outDir, `kit_${STAMP}`));
  });

  it('writes the last run back to the config file', async () => {
    const configPath = join(workDir, 'config.json');
    writeFileSync(configPath, JSON.stringify({ queries: { kit: { query: 'x' } } }));

    await makeMonitor(makeConfig(), { configPath }).runQuery('kit');

    const saved: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    expect(saved).toEqual({ queries: { kit: { query: 'x', last_run: '2024-05-01 09:05:07' } } });
  });

  it('skips extensions when asked', async () => {
    await makeMonitor().runQuery('kit', { extensions: false });
    expect(runExtensions).not.toHaveBeenCalled();
  });

  it('uses the query default level unless another is requested', async () => {
    const monitor = makeMonitor();
    expect((await monitor.runQuery('sp')).tlpLevel).toBe('green');
    expect((await monitor.runQuery('sp', { tlp: 'amber' })).tlpLevel).toBe('amber');
    expect((await monitor.runQuery('sp', { tlp: 'purple' })).tlpLevel).toBe('green');
  });

  it('downloads no screenshots for the intelligence platform', async () => {
    const run = await makeMonitor().runQuery('sp');
    expect(run.screenshots).toBe(0);
    expect(run.resultsCount).toBe(2);
  });

  it('rejects groups, unknown names and platforms without a client', async () => {
    const monitor = makeMonitor();
    await expect(monitor.runQuery('both')).rejects.toThrow(ConfigError);
    await expect(monitor.run('nope')).rejects.toThrow("Query 'nope' not found in configuration");

    await expect(monitor.run('constructor')).rejects.toThrow("Query 'constructor' not found in configuration");

    const noClients = makeMonitor(makeConfig(), { clients: {} });
    await expect(noClients.runQuery('kit')).rejects.toThrow("No client configured for platform 'urlscan'");
  });
});

describe('Monitor.runAll', () => {
  it('runs every standalone query and continues past failures', async () => {
    silentpush.search.mockRejectedValue(new Error('platform down'));

    const runs = await makeMonitor().runAll();

    expect(runs.map((run) => run.name)).toEqual(['kit']);
    expect(urlscan.search).toHaveBeenCalledTimes(1);
    expect(silentpush.search).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Group runs
// ---------------------------------------------------------------------------

describe('Monitor.runGroup', () => {
  it('runs each leaf and builds one combined report', async () => {
    const run = await makeMonitor().run('both');
    const groupDir = join(outDir, `both_${STAMP}_group`);

    expect(run).toMatchObject({
      name: 'both',
      kind: 'query_group',
      runDir: groupDir,
      reportPath: join(groupDir, `report_both_${STAMP}_group_TLP-clear.html`),
      resultsCount: 5,
      iocCount: 32,
      screenshots: 2,
    });
    expect(JSON.parse(readFileSync(join(groupDir, 'results.json'), 'utf-8'))).toEqual({
      kit: urlscanResults,
      sp: silentPushEnvelope,
    });
    expect(readFileSync(join(groupDir, 'images', 'uuid-2.png'), 'utf-8')).toBe('png:uuid-2');
    expect(existsSync(join(outDir, `kit_${STAMP}`, 'results.json'))).toBe(true);
    expect(existsSync(join(groupDir, 'iocs', 'both_iocs.csv'))).toBe(true);
  });

  it('starts extensions once, for the group directory', async () => {
    await makeMonitor().runGroup('both');
    expect(runExtensions).toHaveBeenCalledTimes(1);
    expect(runExtensions).toHaveBeenCalledWith([], join(outDir, `both_${STAMP}_group`));
  });
});

// ---------------------------------------------------------------------------
// Reports from cached results
// ---------------------------------------------------------------------------

describe('Monitor.reportFromResults', () => {
  it('builds a test report without querying the platform', async () => {
    const config = makeConfig();
    const run = await makeMonitor(config).reportFromResults('kit', urlscanResults, { tlp: 'red' });
    const testDir = join(outDir, `kit_${STAMP}_test`);

    expect(run).toMatchObject({
      kind: 'test',
      tlpLevel: 'red',
      runDir: testDir,
      reportPath: join(testDir, `report_kit_${STAMP}_test_TLP-red.html`),
      resultsCount: 3,
      iocCount: 11,
      screenshots: 0,
    });
    expect(urlscan.search).not.toHaveBeenCalled();
    expect(runExtensions).not.toHaveBeenCalled();
    expect(config.queries.kit.lastRun).toBeUndefined();
  });

  it('accepts cached group results keyed by query', async () => {
    const run = await makeMonitor().reportFromResults('both', { kit: urlscanResults, sp: silentPushEnvelope });
    expect(run.resultsCount).toBe(5);
    expect(run.iocCount).toBe(32);
  });
});
