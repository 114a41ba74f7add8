/**
 * List command — shows the queries and groups in the configuration.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import type { QueryListing } from '../../monitor/monitor.js';
import {
  applyVerbosity,
  createMonitor,
  loadConfigOrExit,
  printWarning,
  type GlobalOptions,
} from '../options.js';

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the configured queries and query groups')
    .action((_options: unknown, command: Command) => {
      listCommand(command.optsWithGlobals<GlobalOptions>());
    });
}

/**
 * One line per entry, e.g.
 * ` - phish-kit [urlscan, up to TLP:AMBER]: Kit landing pages`.
 */
export function formatListing(listing: QueryListing): string {
  const kind = listing.type === 'query_group' ? 'group' : listing.platform ?? 'query';
  const tlp = `TLP:${listing.highestTlp.toUpperCase()}`;
  return ` - ${listing.name} [${kind}, up to ${tlp}]: ${listing.description}`;
}

function listCommand(options: GlobalOptions): void {
  applyVerbosity(options);
  const config = loadConfigOrExit(options.config);
  const listings = createMonitor(config, options.config).listQueries();

  if (listings.length === 0) {
    printWarning('No queries defined in the configuration.');
    return;
  }

  console.log(chalk.bold('Available queries:'));
  for (const listing of listings) {
    console.log(formatListing(listing));
  }
}
