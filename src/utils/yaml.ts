/**
 * YAML parsing and serialization utilities.
 * Wraps the 'yaml' package; documents are edited in place so comments
 * survive a round trip.
 */

import { parse, parseDocument } from 'yaml';

export function parseYaml(input: string): unknown {
  return parse(input);
}

/**
 * Set a nested value in a YAML document and return the updated text.
 */
export function setYamlValue(input: string, path: readonly string[], value: unknown): string {
  const doc = parseDocument(input);
  if (doc.errors.length > 0) {
    throw new Error(doc.errors[0].message);
  }
  doc.setIn(path, value);
  return doc.toString();
}
