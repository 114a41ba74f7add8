/**
 * Post-run extensions: external commands started after a query or group
 * finishes, with the run directory appended as their last argument.
 */

import { spawn } from 'node:child_process';

import { createLogger } from '../utils/logger.js';
import type { ExtensionConfig } from '../types/config.js';

const logger = createLogger('extensions');

export interface ExtensionOutcome {
  name: string;
  /** Null when the process could not be started or was killed by a signal. */
  exitCode: number | null;
}

function runOne(extension: ExtensionConfig, runDir: string): Promise<ExtensionOutcome> {
  return new Promise((resolve) => {
    const child = spawn(extension.command, [...extension.args, runDir], { stdio: 'inherit' });

    child.once('error', (err) => {
      logger.error(`Extension '${extension.name}' failed to start: ${err.message}`);
      resolve({ name: extension.name, exitCode: null });
    });

    child.once('close', (code) => {
      if (code === 0) {
        logger.info(`Extension '${extension.name}' finished`);
      } else {
        logger.warn(`Extension '${extension.name}' exited with code ${code ?? 'null'}`);
      }
      resolve({ name: extension.name, exitCode: code });
    });
  });
}

/**
 * Run every enabled extension in order.
 */
export async function runExtensions(
  extensions: readonly ExtensionConfig[],
  runDir: string,
): Promise<ExtensionOutcome[]> {
  const outcomes: ExtensionOutcome[] = [];
  for (const extension of extensions) {
    if (!extension.enabled) {
      logger.debug(`Skipping disabled extension '${extension.name}'`);
      continue;
    }
    logger.info(`Running extension '${extension.name}'`);
    outcomes.push(await runOne(extension, runDir));
  }
  return outcomes;
}
