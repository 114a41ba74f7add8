/**
 * Run command — executes a configured query or query group, or every
 * standalone query with --all.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { RunResult } from '../../monitor/monitor.js';
import { printSummary } from '../../reporting/summary-reporter.js';
import {
  addTlpOption,
  applyVerbosity,
  createMonitor,
  loadConfigOrExit,
  parseDaysOption,
  parseTlpOption,
  printError,
  printInfo,
  printWarning,
  type GlobalOptions,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type RunCommandOptions = GlobalOptions & {
  query?: string;
  all?: boolean;
  days?: string;
  tlp?: string;
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command): void {
  const cmd = program
    .command('run')
    .description('Run a query or query group and generate its report')
    .option('-q, --query <name>', 'Query or query group to run')
    .option('--all', 'Run every standalone query')
    .option('-d, --days <n>', 'Limit results to the last N days');

  addTlpOption(cmd).action(async (_options: unknown, command: Command) => {
    await runCommand(command.optsWithGlobals<RunCommandOptions>());
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runCommand(options: RunCommandOptions): Promise<void> {
  applyVerbosity(options);

  if (!options.query && !options.all) {
    printError('Nothing to run', 'Pass --query <name> or --all');
    process.exit(1);
  }

  const days = parseDaysOption(options.days);
  const tlp = parseTlpOption(options.tlp);
  const config = loadConfigOrExit(options.config);
  const monitor = createMonitor(config, options.config);

  console.log('');
  console.log(chalk.bold.cyan('  scanwatch — Query Run'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  if (days !== undefined) printInfo(`Window: last ${days} days`);
  if (tlp) printInfo(`TLP:    ${tlp}`);
  console.log('');

  if (options.query) {
    const name = options.query;
    const spinner = ora(`Running ${name}...`).start();
    let result: RunResult;
    try {
      result = await monitor.run(name, { days, tlp });
      spinner.succeed(chalk.green(`${name}: ${result.resultsCount} results`));
    } catch (err) {
      spinner.fail(chalk.red(`${name} failed`));
      printError('Query run failed', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
    console.log('');
    printSummary(result);
    return;
  }

  const spinner = ora('Running all queries...').start();
  const results = await monitor.runAll({ days, tlp });
  spinner.succeed(chalk.green(`Completed ${results.length} queries`));

  if (results.length === 0) {
    printWarning('No queries completed');
    return;
  }
  for (const result of results) {
    console.log('');
    printSummary(result);
  }
}
