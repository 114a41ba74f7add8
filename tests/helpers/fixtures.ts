/**
 * Shared test fixtures and builders.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type { QueryConfig, QueryGroupConfig } from '@/types/config.js';

const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export function loadPlatformFixture(name: 'urlscan-search' | 'silentpush-envelope'): unknown {
  return JSON.parse(readFileSync(`${FIXTURES_DIR}platform/${name}.json`, 'utf-8'));
}

export function makeQuery(overrides: Partial<QueryConfig> = {}): QueryConfig {
  return {
    type: 'query',
    query: 'page.domain:evil.test',
    platform: 'urlscan',
    titles: [],
    notes: [],
    references: [],
    tags: [],
    ...overrides,
  };
}

export function makeGroup(
  queries: string[],
  overrides: Partial<QueryGroupConfig> = {},
): QueryGroupConfig {
  return {
    type: 'query_group',
    queries,
    titles: [],
    notes: [],
    references: [],
    tags: [],
    ...overrides,
  };
}
