/**
 * HTML report renderer.
 *
 * Reports are rendered with Handlebars: a page layout (`report.hbs`) plus
 * one partial per entry template, where the template for each entry comes
 * from the run's TemplateRegistry. A query or group may point at its own
 * layout; when that file cannot be loaded or rendered the default layout
 * is used instead.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import handlebars from 'handlebars';

import { reportFilename, type AssembledReport, type GroupSection } from './assembler.js';
import { TemplateRegistry } from '../normalization/template-registry.js';
import { displayTimestamp } from '../utils/dates.js';
import { createLogger } from '../utils/logger.js';
import type { Platform, TlpLevel } from '../types/config.js';
import type { ReportEntry } from '../types/records.js';

const logger = createLogger('html-reporter');

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../templates', import.meta.url));
const LAYOUT_FILE = 'report.hbs';
const FALLBACK_PARTIAL = 'generic';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface HtmlReporterOptions {
  registry: TemplateRegistry;
  /** Directory holding `report.hbs` and `partials/`. */
  templatesDir?: string;
  username?: string;
  /** Clock for the "Generated" timestamp. */
  now?: () => Date;
}

export interface RenderOptions {
  /** Layout file that replaces the default `report.hbs`. */
  layoutPath?: string;
}

export interface RenderedEntry {
  template: string;
  entry: ReportEntry;
}

export interface ReportView {
  name: string;
  title: string;
  description?: string;
  queryString?: string;
  platform?: Platform;
  frequency?: string;
  priority?: string;
  notes: string[];
  references: string[];
  tags: string[];
  tlpLevel: TlpLevel;
  timestamp: string;
  username: string;
  isGroupReport: boolean;
  sections: GroupSection[];
  resultsCount: number;
  entries: RenderedEntry[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? '';
  } catch {
    return String(value);
  }
}

function display(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return toJson(value);
}

/**
 * Drop lines that are empty or whitespace-only.
 */
export function removeBlankLines(html: string): string {
  return html
    .split('\n')
    .filter((line) => line.trim() !== '')
    .join('\n');
}

function createEnvironment(): typeof handlebars {
  const env = handlebars.create();
  env.registerHelper('eq', (a: unknown, b: unknown) => a === b);
  env.registerHelper('upper', (value: unknown) =>
    typeof value === 'string' ? value.toUpperCase() : '',
  );
  env.registerHelper('json', (value: unknown) => toJson(value));
  env.registerHelper('display', (value: unknown) => display(value));
  return env;
}

// ---------------------------------------------------------------------------
// Reporter
// ---------------------------------------------------------------------------

export class HtmlReporter {
  private readonly registry: TemplateRegistry;
  private readonly templatesDir: string;
  private readonly username: string;
  private readonly now: () => Date;

  private env: typeof handlebars | null = null;
  private readonly registeredPartials = new Set<string>();
  private fallbackSource: string | null = null;
  private defaultLayout: handlebars.TemplateDelegate | null = null;

  constructor(options: HtmlReporterOptions) {
    this.registry = options.registry;
    this.templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
    this.username = options.username ?? '';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build the template context for a report.
   */
  buildView(report: AssembledReport): ReportView {
    const platform = report.kind === 'query' ? report.platform : undefined;
    const { metadata } = report;

    return {
      name: report.name,
      title: metadata.title,
      description: metadata.description,
      queryString: metadata.queryString,
      platform,
      frequency: metadata.frequency,
      priority: metadata.priority,
      notes: metadata.notes,
      references: metadata.references,
      tags: metadata.tags,
      tlpLevel: report.tlpLevel,
      timestamp: displayTimestamp(this.now()),
      username: this.username,
      isGroupReport: report.kind === 'query_group',
      sections: report.kind === 'query_group' ? report.sections : [],
      resultsCount: report.resultsCount,
      entries: report.entries.map((entry) => ({
        template: this.registry.templateFor(entry, platform),
        entry,
      })),
    };
  }

  /**
   * Render a report to HTML with blank lines removed.
   */
  async render(report: AssembledReport, options: RenderOptions = {}): Promise<string> {
    const env = await this.environment();
    const view = this.buildView(report);
    await this.registerPartials(env, new Set(view.entries.map((entry) => entry.template)));

    if (options.layoutPath) {
      const custom = await this.loadCustomLayout(env, options.layoutPath);
      if (custom) {
        try {
          return removeBlankLines(custom(view));
        } catch (err) {
          logger.warn(
            `Error rendering template ${options.layoutPath}: ${err instanceof Error ? err.message : String(err)}`,
          );
          logger.warn('Falling back to default template');
        }
      }
    }

    return removeBlankLines(await this.renderDefault(view));
  }

  /**
   * Render and write the report into `runDir`. Returns the file path.
   */
  async writeReport(
    report: AssembledReport,
    runDir: string,
    runDirName: string,
    options: RenderOptions = {},
  ): Promise<string> {
    const html = await this.render(report, options);
    const path = join(runDir, reportFilename(report.name, runDirName, report.tlpLevel));
    await writeFile(path, html, 'utf-8');
    logger.info(`Report written to ${path}`);
    return path;
  }

  // -------------------------------------------------------------------------
  // Template loading
  // -------------------------------------------------------------------------

  private async environment(): Promise<typeof handlebars> {
    if (!this.env) {
      this.env = createEnvironment();
      await this.registerPartials(this.env, this.registry.templateNames());
    }
    return this.env;
  }

  /**
   * Register any partial not loaded yet. The registry may gain mappings
   * between renders, so each render checks the templates its entries use.
   */
  private async registerPartials(env: typeof handlebars, names: Iterable<string>): Promise<void> {
    for (const name of names) {
      if (this.registeredPartials.has(name)) continue;
      try {
        env.registerPartial(name, await readFile(this.partialPath(name), 'utf-8'));
      } catch (err) {
        logger.warn(
          `Template partial '${name}' could not be loaded, using '${FALLBACK_PARTIAL}': ${err instanceof Error ? err.message : String(err)}`,
        );
        env.registerPartial(name, await this.fallbackPartial());
      }
      this.registeredPartials.add(name);
    }
  }

  private async fallbackPartial(): Promise<string> {
    if (this.fallbackSource === null) {
      this.fallbackSource = await readFile(this.partialPath(FALLBACK_PARTIAL), 'utf-8');
    }
    return this.fallbackSource;
  }

  private partialPath(name: string): string {
    return join(this.templatesDir, 'partials', `${name}.hbs`);
  }

  private async loadCustomLayout(
    env: typeof handlebars,
    layoutPath: string,
  ): Promise<handlebars.TemplateDelegate | null> {
    try {
      const source = await readFile(layoutPath, 'utf-8');
      return env.compile(source);
    } catch (err) {
      logger.warn(
        `Error loading template ${layoutPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
      logger.warn('Falling back to default template');
      return null;
    }
  }

  private async renderDefault(view: ReportView): Promise<string> {
    if (!this.defaultLayout) {
      const env = await this.environment();
      const source = await readFile(join(this.templatesDir, LAYOUT_FILE), 'utf-8');
      this.defaultLayout = env.compile(source);
    }
    return this.defaultLayout(view);
  }
}
