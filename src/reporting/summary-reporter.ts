/**
 * Terminal summary of a monitor run, drawn with box characters and chalk
 * colors. Printed by the CLI after each query or group.
 */

import chalk from 'chalk';

import type { TlpLevel } from '../types/config.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface RunSummary {
  name: string;
  kind: 'query' | 'query_group' | 'test';
  tlpLevel: TlpLevel;
  runDir: string;
  reportPath: string;
  resultsCount: number;
  iocCount: number;
  screenshots: number;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Interior width of the box. */
const BOX_WIDTH = 60;

const TLP_COLORS: Record<TlpLevel, (text: string) => string> = {
  clear: chalk.white,
  white: chalk.white,
  green: chalk.green,
  amber: chalk.yellow,
  red: chalk.red,
};

const KIND_LABELS: Record<RunSummary['kind'], string> = {
  query: 'Query',
  query_group: 'Query group',
  test: 'Test report',
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function formatSummaryTable(summary: RunSummary): string {
  const rule = (left: string, right: string): string =>
    chalk.cyan(`${left}${''.padStart(BOX_WIDTH, '═')}${right}`);

  const lines: string[] = [];
  lines.push(rule('╔', '╗'));
  lines.push(formatCenteredLine(`${KIND_LABELS[summary.kind]}: ${summary.name}`));
  lines.push(rule('╠', '╣'));

  const tlp = `TLP:${summary.tlpLevel.toUpperCase()}`;
  lines.push(formatLineRaw(`  Level: ${TLP_COLORS[summary.tlpLevel](tlp)}`));
  lines.push(formatLine(`  Results: ${summary.resultsCount}  │  IOCs: ${summary.iocCount}  │  Screenshots: ${summary.screenshots}`));
  lines.push(formatLine(`  Time: ${formatDuration(summary.durationMs)}`));

  lines.push(rule('╠', '╣'));
  lines.push(formatSectionHeader('OUTPUT'));
  lines.push(formatLine(`  ${truncate(summary.runDir)}`));
  lines.push(formatLine(`  ${truncate(summary.reportPath)}`));
  lines.push(rule('╚', '╝'));

  return lines.join('\n');
}

export function printSummary(summary: RunSummary): void {
  console.log(formatSummaryTable(summary));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Like formatLine, for text that already carries ANSI codes: padding is
 * computed from the visible length.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string): string {
  const shown = truncate(text);
  const totalPadding = BOX_WIDTH - 2 - shown.length;
  const leftPad = Math.floor(totalPadding / 2);
  const padded = ' '.repeat(leftPad) + shown + ' '.repeat(totalPadding - leftPad);
  return `${chalk.cyan('║')} ${chalk.bold.white(padded)} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

/** Keep the tail of long paths so the file name stays readable. */
function truncate(text: string, width: number = BOX_WIDTH - 4): string {
  if (text.length <= width) return text;
  return `…${text.slice(text.length - width + 1)}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
