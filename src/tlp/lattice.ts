/**
 * Traffic Light Protocol visibility rules.
 *
 * Levels are ranked clear/white (1) < green (2) < amber (3) < red (4).
 * An item is visible in a report when its rank does not exceed the
 * report's rank.
 */

import type { TlpLevel } from '../types/config.js';

export const TLP_LEVELS: readonly TlpLevel[] = ['clear', 'white', 'green', 'amber', 'red'];

const TLP_RANK: Record<TlpLevel, number> = {
  clear: 1,
  white: 1,
  green: 2,
  amber: 3,
  red: 4,
};

/**
 * Parse a level name, case-insensitively. Returns undefined for anything
 * that is not one of the five level names.
 */
export function parseTlpLevel(value: unknown): TlpLevel | undefined {
  if (typeof value !== 'string') return undefined;
  const lower = value.trim().toLowerCase();
  return TLP_LEVELS.find((level) => level === lower);
}

export function tlpRank(level: TlpLevel): number {
  return TLP_RANK[level];
}

/**
 * Whether an item labeled `itemLevel` may appear in a report cleared for
 * `reportLevel`. A missing or unknown item label counts as clear; a missing
 * or unknown report level counts as red.
 */
export function isVisible(itemLevel: unknown, reportLevel: unknown): boolean {
  const item = parseTlpLevel(itemLevel) ?? 'clear';
  const report = parseTlpLevel(reportLevel) ?? 'red';
  return TLP_RANK[item] <= TLP_RANK[report];
}

/**
 * Pick the report level: the requested level, then the query default, then
 * the global default. Empty and invalid candidates are skipped.
 */
export function determineReportLevel(
  requested: unknown,
  queryDefault: unknown,
  globalDefault: unknown,
): TlpLevel {
  return (
    parseTlpLevel(requested) ??
    parseTlpLevel(queryDefault) ??
    parseTlpLevel(globalDefault) ??
    'clear'
  );
}

/**
 * The most restrictive level among `levels`; `clear` when there are none.
 */
export function highestTlpLevel(levels: Iterable<TlpLevel | undefined>): TlpLevel {
  let highest: TlpLevel = 'clear';
  for (const level of levels) {
    if (level && TLP_RANK[level] > TLP_RANK[highest]) {
      highest = level;
    }
  }
  return highest;
}
