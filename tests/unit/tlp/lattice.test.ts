/**
 * Unit tests for TLP visibility rules.
 *
 * Tests: parseTlpLevel, isVisible, determineReportLevel, highestTlpLevel
 */

import { describe, it, expect } from 'vitest';
import {
  TLP_LEVELS,
  determineReportLevel,
  highestTlpLevel,
  isVisible,
  parseTlpLevel,
  tlpRank,
} from '@/tlp/lattice.js';

describe('parseTlpLevel', () => {
  it('accepts every level name case-insensitively', () => {
    expect(parseTlpLevel('AMBER')).toBe('amber');
    expect(parseTlpLevel(' Green ')).toBe('green');
    expect(parseTlpLevel('white')).toBe('white');
  });

  it('returns undefined for unknown or non-string values', () => {
    expect(parseTlpLevel('purple')).toBeUndefined();
    expect(parseTlpLevel('')).toBeUndefined();
    expect(parseTlpLevel(3)).toBeUndefined();
    expect(parseTlpLevel(null)).toBeUndefined();
  });
});

describe('isVisible', () => {
  it('hides amber items from a clear report', () => {
    expect(isVisible('amber', 'clear')).toBe(false);
  });

  it('shows clear items in a red report', () => {
    expect(isVisible('clear', 'red')).toBe(true);
  });

  it('treats white and clear as the same level', () => {
    expect(isVisible('white', 'clear')).toBe(true);
    expect(isVisible('clear', 'white')).toBe(true);
  });

  it('shows an item at exactly the report level', () => {
    expect(isVisible('green', 'green')).toBe(true);
    expect(isVisible('red', 'amber')).toBe(false);
  });

  it('reads a missing item level as clear', () => {
    expect(isVisible(undefined, 'clear')).toBe(true);
    expect(isVisible('bogus', 'green')).toBe(true);
  });

  it('reads a missing report level as red', () => {
    expect(isVisible('red', undefined)).toBe(true);
    expect(isVisible('amber', 'bogus')).toBe(true);
  });

  const RANKS = { clear: 1, white: 1, green: 2, amber: 3, red: 4 } as const;
  const PAIRS = TLP_LEVELS.flatMap((item) => TLP_LEVELS.map((report) => [item, report] as const));

  it.each(PAIRS)('shows %s items in a %s report only when its rank allows', (item, report) => {
    expect(isVisible(item, report)).toBe(RANKS[item] <= RANKS[report]);
  });

  it('is monotone in the report level', () => {
    for (const item of TLP_LEVELS) {
      for (const report of TLP_LEVELS) {
        if (!isVisible(item, report)) continue;
        for (const higher of TLP_LEVELS) {
          if (tlpRank(higher) >= tlpRank(report)) {
            expect(isVisible(item, higher)).toBe(true);
          }
        }
      }
    }
  });
});

describe('determineReportLevel', () => {
  it('skips an invalid requested level', () => {
    expect(determineReportLevel('purple', 'amber', 'clear')).toBe('amber');
  });

  it('prefers a valid requested level', () => {
    expect(determineReportLevel('RED', 'amber', 'clear')).toBe('red');
  });

  it('falls back to the global default, then clear', () => {
    expect(determineReportLevel(undefined, '', 'green')).toBe('green');
    expect(determineReportLevel(undefined, undefined, 'nope')).toBe('clear');
  });
});

describe('highestTlpLevel', () => {
  it('returns the most restrictive level', () => {
    expect(highestTlpLevel(['green', undefined, 'amber', 'clear'])).toBe('amber');
  });

  it('returns clear for no levels', () => {
    expect(highestTlpLevel([])).toBe('clear');
  });
});
