/**
 * Zod schemas for the configuration file.
 *
 * The file uses snake_case keys. Metadata lists (titles, notes, references,
 * tags) are accepted in both the labeled form `{value, tlp_level}` and the
 * older bare forms, and come out as `TlpLabeledItem[]`. Unknown TLP
 * strings are dropped here so the default chain applies later.
 */

import { z } from 'zod';

import { parseTlpLevel } from '../tlp/lattice.js';
import type {
  ExtensionConfig,
  MonitorConfig,
  QueryConfig,
  QueryEntry,
  QueryGroupConfig,
  TlpLabeledItem,
} from '../types/config.js';

// --- Primitives ---

const TlpField = z
  .string()
  .nullish()
  .transform((value) => parseTlpLevel(value));

const OptionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

// --- Labeled metadata items ---

const LabeledObject = z
  .object({
    value: z.string().optional(),
    title: z.string().optional(),
    text: z.string().optional(),
    url: z.string().optional(),
    tag: z.string().optional(),
    tlp_level: TlpField,
  })
  .passthrough();

const LabeledItem = z.union([z.string(), LabeledObject]);

function toLabeledItem(item: z.infer<typeof LabeledItem>): TlpLabeledItem | null {
  if (typeof item === 'string') {
    return { value: item };
  }
  const value = item.value ?? item.title ?? item.text ?? item.url ?? item.tag;
  if (value === undefined) return null;
  const labeled: TlpLabeledItem = { value };
  if (item.tlp_level) labeled.tlpLevel = item.tlp_level;
  return labeled;
}

export const MetadataListSchema = z
  .union([z.string(), z.array(LabeledItem)])
  .nullish()
  .transform((value): TlpLabeledItem[] => {
    if (value === null || value === undefined || value === '') return [];
    const items = typeof value === 'string' ? [value] : value;
    return items.map(toLabeledItem).filter((item): item is TlpLabeledItem => item !== null);
  });

// --- Queries ---

const CommonFields = {
  description: OptionalText,
  description_tlp_level: TlpField,
  default_tlp_level: TlpField,
  titles: MetadataListSchema,
  notes: MetadataListSchema,
  references: MetadataListSchema,
  tags: MetadataListSchema,
  tags_tlp_level: TlpField,
  template_path: OptionalText,
  last_run: OptionalText,
};

export const QuerySchema = z.object({
  type: z.literal('query').optional(),
  query: z.string().min(1, 'query string must not be empty'),
  platform: z
    .string()
    .default('urlscan')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['urlscan', 'silentpush'])),
  query_tlp_level: TlpField,
  frequency: OptionalText,
  frequency_tlp_level: TlpField,
  priority: OptionalText,
  priority_tlp_level: TlpField,
  endpoint: OptionalText,
  ...CommonFields,
});

export const QueryGroupSchema = z.object({
  type: z.literal('query_group'),
  queries: z.array(z.string()).min(1, 'a query group needs at least one member'),
  ...CommonFields,
});

export const ExtensionSchema = z.object({
  name: z.string(),
  command: z.string(),
  args: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
});

export const ConfigFileSchema = z.object({
  output_directory: z.string().default('output'),
  default_tlp_level: TlpField,
  default_template_path: OptionalText,
  report_username: z.string().default(''),
  default_days: z.number().int().positive().optional(),
  extensions: z.array(ExtensionSchema).default([]),
  queries: z.record(z.union([QueryGroupSchema, QuerySchema])).default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// --- Mapping to the runtime model ---

type ParsedQuery = z.infer<typeof QuerySchema>;
type ParsedGroup = z.infer<typeof QueryGroupSchema>;

function toQuery(parsed: ParsedQuery): QueryConfig {
  return {
    type: 'query',
    query: parsed.query,
    platform: parsed.platform,
    description: parsed.description,
    descriptionTlpLevel: parsed.description_tlp_level,
    queryTlpLevel: parsed.query_tlp_level,
    defaultTlpLevel: parsed.default_tlp_level,
    titles: parsed.titles,
    notes: parsed.notes,
    references: parsed.references,
    tags: parsed.tags,
    tagsTlpLevel: parsed.tags_tlp_level,
    frequency: parsed.frequency,
    frequencyTlpLevel: parsed.frequency_tlp_level,
    priority: parsed.priority,
    priorityTlpLevel: parsed.priority_tlp_level,
    templatePath: parsed.template_path,
    endpoint: parsed.endpoint,
    lastRun: parsed.last_run,
  };
}

function toGroup(parsed: ParsedGroup): QueryGroupConfig {
  return {
    type: 'query_group',
    queries: parsed.queries,
    description: parsed.description,
    descriptionTlpLevel: parsed.description_tlp_level,
    defaultTlpLevel: parsed.default_tlp_level,
    titles: parsed.titles,
    notes: parsed.notes,
    references: parsed.references,
    tags: parsed.tags,
    tagsTlpLevel: parsed.tags_tlp_level,
    templatePath: parsed.template_path,
    lastRun: parsed.last_run,
  };
}

export function toMonitorConfig(file: ConfigFile): MonitorConfig {
  const queries: Record<string, QueryEntry> = {};
  for (const [name, entry] of Object.entries(file.queries)) {
    queries[name] = entry.type === 'query_group' ? toGroup(entry) : toQuery(entry);
  }

  const extensions: ExtensionConfig[] = file.extensions.map((ext) => ({ ...ext }));

  return {
    outputDirectory: file.output_directory,
    defaultTlpLevel: file.default_tlp_level,
    defaultTemplatePath: file.default_template_path,
    reportUsername: file.report_username,
    defaultDays: file.default_days,
    extensions,
    queries,
  };
}
