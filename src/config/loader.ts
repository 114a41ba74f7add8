/**
 * Configuration loading and write-back.
 *
 * Config files are JSON (`.json`) or YAML (`.yaml`, `.yml`). API keys come
 * from the environment, never from the file.
 */

import { readFileSync, writeFileSync } from 'fs';
import { extname } from 'path';
import type { ZodError } from 'zod';

import { ConfigFileSchema, toMonitorConfig } from './schema.js';
import { ConfigError } from '../errors.js';
import { isRawRecord } from '../normalization/classifier.js';
import { parseYaml, setYamlValue } from '../utils/yaml.js';
import { createLogger } from '../utils/logger.js';
import type { ApiKeys, MonitorConfig } from '../types/config.js';

const logger = createLogger('config');

export type ConfigFormat = 'json' | 'yaml';

export function detectConfigFormat(path: string): ConfigFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Parse and validate configuration text.
 */
export function parseConfig(text: string, format: ConfigFormat): MonitorConfig {
  let document: unknown;
  try {
    document = format === 'yaml' ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Could not parse ${format.toUpperCase()} configuration: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = ConfigFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(parsed.error)}`);
  }
  return toMonitorConfig(parsed.data);
}

export function loadConfig(path: string): MonitorConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Config file not found at ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const config = parseConfig(text, detectConfigFormat(path));
  logger.debug(`Loaded ${Object.keys(config.queries).length} queries from ${path}`);
  return config;
}

/**
 * Record a query's last run time in the config file, keeping the rest of
 * the file as it is.
 */
export function saveLastRun(path: string, queryName: string, timestamp: string): void {
  const text = readFileSync(path, 'utf-8');
  const format = detectConfigFormat(path);

  let updated: string;
  if (format === 'yaml') {
    updated = setYamlValue(text, ['queries', queryName, 'last_run'], timestamp);
  } else {
    const document: unknown = JSON.parse(text);
    if (!isRawRecord(document) || !isRawRecord(document.queries)) {
      throw new ConfigError(`Config file ${path} has no queries section`);
    }
    const entry = document.queries[queryName];
    if (!isRawRecord(entry)) {
      throw new ConfigError(`Query '${queryName}' not found in ${path}`);
    }
    entry.last_run = timestamp;
    updated = JSON.stringify(document, null, 2) + '\n';
  }

  writeFileSync(path, updated, 'utf-8');
}

export function loadApiKeys(env: NodeJS.ProcessEnv = process.env): ApiKeys {
  return {
    urlscan: env.URLSCAN_API_KEY || undefined,
    silentpush: env.SILENTPUSH_API_KEY || undefined,
  };
}
