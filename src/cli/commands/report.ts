/**
 * Report command — rebuilds a report from cached results (a run's
 * `results.json`) without querying any platform.
 */

import { readFileSync } from 'fs';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { printSummary } from '../../reporting/summary-reporter.js';
import {
  addTlpOption,
  applyVerbosity,
  createMonitor,
  loadConfigOrExit,
  parseTlpOption,
  printError,
  resolveInputPath,
  type GlobalOptions,
} from '../options.js';

type ReportCommandOptions = GlobalOptions & {
  query: string;
  input: string;
  tlp?: string;
};

export function registerReportCommand(program: Command): void {
  const cmd = program
    .command('report')
    .description('Generate a test report from cached results')
    .requiredOption('-q, --query <name>', 'Query or query group the results belong to')
    .requiredOption('-i, --input <path>', 'Cached results JSON file');

  addTlpOption(cmd).action(async (_options: unknown, command: Command) => {
    await reportCommand(command.optsWithGlobals<ReportCommandOptions>());
  });
}

async function reportCommand(options: ReportCommandOptions): Promise<void> {
  applyVerbosity(options);
  const tlp = parseTlpOption(options.tlp);
  const inputPath = resolveInputPath(options.input);
  const config = loadConfigOrExit(options.config);

  let results: unknown;
  try {
    results = JSON.parse(readFileSync(inputPath, 'utf-8'));
  } catch (err) {
    printError('Failed to read cached results', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  const monitor = createMonitor(config, options.config);
  const spinner = ora(`Rendering report for ${options.query}...`).start();
  try {
    const result = await monitor.reportFromResults(options.query, results, { tlp });
    spinner.succeed(chalk.green(`Report written to ${result.reportPath}`));
    console.log('');
    printSummary(result);
  } catch (err) {
    spinner.fail(chalk.red('Report generation failed'));
    printError('Report error', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
