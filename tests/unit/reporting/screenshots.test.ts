/**
 * Unit tests for group screenshot copying.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { copyScreenshots } from '@/reporting/screenshots.js';
import type { ReportEntry } from '@/types/records.js';

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'scanwatch-shots-'));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

function webScanEntry(scanId: string, sourceQuery?: string): ReportEntry {
  return {
    dataType: 'urlscan_result',
    fields: {},
    defangedUrl: '',
    defangedDomain: '',
    scanId,
    localScreenshot: `images/${scanId}.png`,
    sourceQuery,
  };
}

describe('copyScreenshots', () => {
  it('copies screenshots from each source query directory', () => {
    const aDir = join(workDir, 'a', 'images');
    mkdirSync(aDir, { recursive: true });
    writeFileSync(join(aDir, 'u1.png'), 'png-bytes');
    const dest = join(workDir, 'group', 'images');

    const copied = copyScreenshots(
      [webScanEntry('u1', 'a'), webScanEntry('u2', 'a')],
      new Map([['a', aDir]]),
      dest,
    );

    expect(copied).toBe(1);
    expect(readFileSync(join(dest, 'u1.png'), 'utf-8')).toBe('png-bytes');
    expect(existsSync(join(dest, 'u2.png'))).toBe(false);
  });

  it('skips entries without a source query or known directory', () => {
    const dest = join(workDir, 'out');
    const entries: ReportEntry[] = [
      webScanEntry('u1'),
      webScanEntry('u2', 'unknown'),
      { dataType: 'message', message: 'none', sourceQuery: 'a' },
    ];

    expect(copyScreenshots(entries, new Map([['a', workDir]]), dest)).toBe(0);
    expect(existsSync(dest)).toBe(true);
  });
});
