/**
 * Shared CLI option helpers for scanwatch commands.
 *
 * Option parsing, config loading and monitor construction used by every
 * command, plus the colored message printers.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { SilentPushClient } from '../clients/silentpush-client.js';
import { UrlscanClient } from '../clients/urlscan-client.js';
import { loadApiKeys, loadConfig } from '../config/loader.js';
import { Monitor } from '../monitor/monitor.js';
import { parseTlpLevel, TLP_LEVELS } from '../tlp/lattice.js';
import { setLogLevel } from '../utils/logger.js';
import type { MonitorConfig, TlpLevel } from '../types/config.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/** Options every command receives through `optsWithGlobals()`. */
export type GlobalOptions = {
  config: string;
  verbose?: boolean;
};

export const DEFAULT_CONFIG_PATH = 'config.json';

/**
 * Add the global --config and --verbose options to the program.
 */
export function addGlobalOptions(program: Command): Command {
  return program
    .option('-c, --config <path>', 'Path to configuration file (JSON or YAML)', DEFAULT_CONFIG_PATH)
    .option('--verbose', 'Verbose output');
}

/**
 * Add the --tlp option to a command.
 */
export function addTlpOption(cmd: Command): Command {
  return cmd.option('--tlp <level>', `Report TLP level: ${TLP_LEVELS.join(', ')}`);
}

/**
 * Apply --verbose: debug logging for the rest of the process.
 */
export function applyVerbosity(options: GlobalOptions): void {
  if (options.verbose) setLogLevel('debug');
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

/**
 * Validate a --tlp value. Exits on an unknown level.
 */
export function parseTlpOption(value: string | undefined): TlpLevel | undefined {
  if (value === undefined) return undefined;
  const level = parseTlpLevel(value);
  if (!level) {
    console.error(
      chalk.red(`Error: Unknown TLP level "${value}". Valid levels: ${TLP_LEVELS.join(', ')}`),
    );
    process.exit(1);
  }
  return level;
}

/**
 * Validate a --days value. Exits unless it is a positive integer.
 */
export function parseDaysOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const days = Number(value);
  if (!Number.isInteger(days) || days <= 0) {
    console.error(chalk.red(`Error: --days must be a positive integer, got "${value}"`));
    process.exit(1);
  }
  return days;
}

// ---------------------------------------------------------------------------
// Path resolution and setup
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input file exists.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);

  if (!existsSync(resolved)) {
    console.error(chalk.red(`Error: Input path does not exist: ${resolved}`));
    process.exit(1);
  }
  if (statSync(resolved).isDirectory()) {
    console.error(chalk.red(`Error: Input path is a directory: ${resolved}`));
    process.exit(1);
  }

  return resolved;
}

/**
 * Load the config file, exiting with a readable message on failure.
 */
export function loadConfigOrExit(path: string): MonitorConfig {
  try {
    return loadConfig(resolve(path));
  } catch (err) {
    printError('Could not load configuration', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

/**
 * Build a monitor with platform clients keyed from the environment.
 */
export function createMonitor(config: MonitorConfig, configPath: string): Monitor {
  const keys = loadApiKeys();
  const urlscan = new UrlscanClient(keys.urlscan);

  return new Monitor(config, {
    clients: {
      urlscan,
      silentpush: new SilentPushClient(keys.silentpush),
    },
    screenshots: urlscan,
    configPath: resolve(configPath),
  });
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
