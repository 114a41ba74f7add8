/**
 * Date windows for platform queries.
 *
 * The window starts `days` ago when the caller asks for it, otherwise at
 * the query's last recorded run, otherwise `default_days` ago. With none
 * of those the query runs unfiltered.
 */

import { displayTimestamp } from '../utils/dates.js';
import type { Platform } from '../types/config.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const LAST_RUN_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export interface WindowOptions {
  days?: number;
  lastRun?: string;
  defaultDays?: number;
  now: Date;
}

/**
 * Parse a recorded `last_run` value. The monitor writes local
 * `YYYY-MM-DD HH:MM:SS`; ISO strings are accepted too.
 */
export function parseLastRun(value: string): Date | null {
  const match = LAST_RUN_PATTERN.exec(value.trim());
  if (match) {
    const [, y, mo, d, h, mi, s] = match.map(Number);
    const date = new Date(y, mo - 1, d, h, mi, s);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

export function searchWindowStart(options: WindowOptions): Date | null {
  const { days, lastRun, defaultDays, now } = options;

  if (days !== undefined) {
    return new Date(now.getTime() - days * DAY_MS);
  }
  if (lastRun) {
    const parsed = parseLastRun(lastRun);
    if (parsed) return parsed;
  }
  if (defaultDays !== undefined) {
    return new Date(now.getTime() - defaultDays * DAY_MS);
  }
  return null;
}

/**
 * Append the platform's date clause to a query string.
 */
export function applyDateFilter(platform: Platform, query: string, since: Date | null): string {
  if (!since) return query;

  const stamp = displayTimestamp(since);
  switch (platform) {
    case 'urlscan':
      return `${query} AND date:>=${stamp.substring(0, 10)}`;
    case 'silentpush':
      return `${query} AND scan_date >= "${stamp}"`;
  }
}
