/**
 * Query group resolution.
 *
 * Groups name their members (queries or other groups) in report order and
 * may nest to any depth. A group reached again along its own path is a
 * cycle and raises GroupCycleError; the same member appearing under two
 * different parents is fine.
 */

import { ConfigError, GroupCycleError } from '../errors.js';
import type { QueryConfig, QueryEntry, QueryGroupConfig } from '../types/config.js';

export interface QueryNode {
  type: 'query';
  name: string;
  config: QueryConfig;
}

export interface GroupNode {
  type: 'query_group';
  name: string;
  config: QueryGroupConfig;
  members: GroupMember[];
}

export type GroupMember = QueryNode | GroupNode;

function lookup(queries: Record<string, QueryEntry>, name: string): QueryEntry {
  const entry = Object.hasOwn(queries, name) ? queries[name] : undefined;
  if (!entry) {
    throw new ConfigError(`Query '${name}' not found in configuration`);
  }
  return entry;
}

function resolveMember(
  queries: Record<string, QueryEntry>,
  name: string,
  path: string[],
): GroupMember {
  const entry = lookup(queries, name);
  if (entry.type === 'query') {
    return { type: 'query', name, config: entry };
  }

  if (path.includes(name)) {
    throw new GroupCycleError([...path, name]);
  }

  const nextPath = [...path, name];
  return {
    type: 'query_group',
    name,
    config: entry,
    members: entry.queries.map((member) => resolveMember(queries, member, nextPath)),
  };
}

/**
 * Resolve a group into its member tree.
 */
export function resolveGroup(queries: Record<string, QueryEntry>, name: string): GroupNode {
  const node = resolveMember(queries, name, []);
  if (node.type !== 'query_group') {
    throw new ConfigError(`'${name}' is a query, not a query group`);
  }
  return node;
}

/**
 * Leaf query names under a group, in declaration order, each listed once.
 */
export function leafQueries(node: GroupNode): QueryNode[] {
  const seen = new Set<string>();
  const leaves: QueryNode[] = [];

  const visit = (member: GroupMember): void => {
    if (member.type === 'query_group') {
      member.members.forEach(visit);
      return;
    }
    if (!seen.has(member.name)) {
      seen.add(member.name);
      leaves.push(member);
    }
  };

  node.members.forEach(visit);
  return leaves;
}

export function isGroup(entry: QueryEntry): entry is QueryGroupConfig {
  return entry.type === 'query_group';
}
