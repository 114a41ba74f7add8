#!/usr/bin/env node

/**
 * scanwatch CLI — scan-data monitoring and TLP-aware reporting
 *
 * Usage:
 *   scanwatch run --query phish-kit --days 7 --tlp amber
 *   scanwatch run --all
 *   scanwatch list
 *   scanwatch report --query phish-kit --input output/phish-kit_20240501_134502/results.json
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import chalk from 'chalk';

import { registerRunCommand } from './commands/run.js';
import { registerListCommand } from './commands/list.js';
import { registerReportCommand } from './commands/report.js';
import { addGlobalOptions } from './options.js';

const pkg: unknown = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
);
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('scanwatch')
  .description('Monitor scan-data platforms and generate TLP-aware reports')
  .version(version);

addGlobalOptions(program);

// Register all commands
registerRunCommand(program);
registerListCommand(program);
registerReportCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // Help and version output arrive as CommanderErrors
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "scanwatch --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
