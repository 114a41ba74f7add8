/**
 * Maps report entries to the template partial that renders them.
 *
 * One registry is built per run and handed to the renderer; new data types
 * are supported by registering another mapping.
 */

import type { Platform } from '../types/config.js';
import type { ReportEntry } from '../types/records.js';

export const DEFAULT_PLATFORM_TEMPLATES: Readonly<Record<string, string>> = {
  urlscan: 'urlscan-result',
  silentpush: 'generic',
  default: 'urlscan-result',
};

export const DEFAULT_DATA_TYPE_TEMPLATES: Readonly<Record<string, string>> = {
  whois: 'whois',
  webscan: 'webscan',
  domain_search: 'domain-search',
  generic: 'generic',
  message: 'message',
};

export class TemplateRegistry {
  private platformDefaults: Map<string, string>;
  private dataTypeTemplates: Map<string, string>;

  constructor(
    platformDefaults: Readonly<Record<string, string>> = DEFAULT_PLATFORM_TEMPLATES,
    dataTypeTemplates: Readonly<Record<string, string>> = DEFAULT_DATA_TYPE_TEMPLATES,
  ) {
    this.platformDefaults = new Map(Object.entries(platformDefaults));
    this.dataTypeTemplates = new Map(Object.entries(dataTypeTemplates));
  }

  /**
   * Template for an entry: its data type mapping first, then the platform
   * default, then the global default.
   */
  templateFor(entry: ReportEntry, platform?: Platform): string {
    const byType = this.dataTypeTemplates.get(entry.dataType);
    if (byType) return byType;

    const key = platform ?? (entry.dataType === 'urlscan_result' ? 'urlscan' : 'default');
    return (
      this.platformDefaults.get(key) ??
      this.platformDefaults.get('default') ??
      DEFAULT_PLATFORM_TEMPLATES.default
    );
  }

  registerTemplate(dataType: string, template: string): void {
    this.dataTypeTemplates.set(dataType, template);
  }

  registerPlatformDefault(platform: string, template: string): void {
    this.platformDefaults.set(platform, template);
  }

  /** Every distinct template name the registry can return. */
  templateNames(): string[] {
    return [...new Set([...this.dataTypeTemplates.values(), ...this.platformDefaults.values()])];
  }
}
