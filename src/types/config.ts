/**
 * Configuration types for scanwatch.
 */

export type TlpLevel = 'clear' | 'white' | 'green' | 'amber' | 'red';

export type Platform = 'urlscan' | 'silentpush';

/** A metadata element paired with an optional sensitivity label. */
export interface TlpLabeledItem {
  value: string;
  tlpLevel?: TlpLevel;
}

export interface QueryConfig {
  type: 'query';
  query: string;
  platform: Platform;
  description?: string;
  descriptionTlpLevel?: TlpLevel;
  queryTlpLevel?: TlpLevel;
  defaultTlpLevel?: TlpLevel;
  titles: TlpLabeledItem[];
  notes: TlpLabeledItem[];
  references: TlpLabeledItem[];
  tags: TlpLabeledItem[];
  tagsTlpLevel?: TlpLevel;
  frequency?: string;
  frequencyTlpLevel?: TlpLevel;
  priority?: string;
  priorityTlpLevel?: TlpLevel;
  templatePath?: string;
  endpoint?: string;
  lastRun?: string;
}

export interface QueryGroupConfig {
  type: 'query_group';
  /** Member query or group names, in report order. */
  queries: string[];
  description?: string;
  descriptionTlpLevel?: TlpLevel;
  defaultTlpLevel?: TlpLevel;
  titles: TlpLabeledItem[];
  notes: TlpLabeledItem[];
  references: TlpLabeledItem[];
  tags: TlpLabeledItem[];
  tagsTlpLevel?: TlpLevel;
  templatePath?: string;
  lastRun?: string;
}

export type QueryEntry = QueryConfig | QueryGroupConfig;

export interface ExtensionConfig {
  name: string;
  command: string;
  args: string[];
  enabled: boolean;
}

export interface MonitorConfig {
  outputDirectory: string;
  defaultTlpLevel?: TlpLevel;
  defaultTemplatePath?: string;
  reportUsername: string;
  defaultDays?: number;
  extensions: ExtensionConfig[];
  queries: Record<string, QueryEntry>;
}

export interface ApiKeys {
  urlscan?: string;
  silentpush?: string;
}
