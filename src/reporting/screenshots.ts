/**
 * Screenshot copying for group reports.
 *
 * Each member query keeps its screenshots in its own run directory; the
 * group report links `images/<scan id>.png` relative to the group run
 * directory, so the files are copied over. Missing or unreadable files
 * are logged and skipped.
 */

import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

import { createLogger } from '../utils/logger.js';
import type { ReportEntry } from '../types/records.js';

const logger = createLogger('screenshots');

/**
 * Copy the screenshot of every web-scan entry from its source query's
 * image directory into `destDir`. Returns the number of files copied.
 */
export function copyScreenshots(
  entries: readonly ReportEntry[],
  sourceDirs: ReadonlyMap<string, string>,
  destDir: string,
): number {
  mkdirSync(destDir, { recursive: true });
  let copied = 0;

  for (const entry of entries) {
    if (entry.dataType !== 'urlscan_result' || !entry.scanId || !entry.sourceQuery) continue;

    const sourceDir = sourceDirs.get(entry.sourceQuery);
    if (!sourceDir) continue;

    const file = `${entry.scanId}.png`;
    const source = join(sourceDir, file);
    if (!existsSync(source)) {
      logger.debug(`No screenshot at ${source}`);
      continue;
    }

    try {
      copyFileSync(source, join(destDir, file));
      copied++;
    } catch (err) {
      logger.warn(`Could not copy screenshot ${source}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return copied;
}
