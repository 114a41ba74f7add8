/**
 * Barrel exports for report assembly and rendering.
 */

export {
  assembleQueryReport,
  assembleGroupReport,
  processResults,
  countResults,
  resolveMetadata,
  highestMetadataTlp,
  visibleValues,
  toUrlscanResult,
  defaultTitle,
  runDirSuffix,
  reportFilename,
  type AssembledReport,
  type QueryReport,
  type GroupReport,
  type GroupSection,
  type ReportMetadata,
  type QueryReportInput,
  type GroupReportInput,
} from './assembler.js';

export {
  HtmlReporter,
  removeBlankLines,
  DEFAULT_TEMPLATES_DIR,
  type HtmlReporterOptions,
  type RenderOptions,
  type ReportView,
} from './html-reporter.js';

export { copyScreenshots } from './screenshots.js';

export {
  formatSummaryTable,
  printSummary,
  formatDuration,
  type RunSummary,
} from './summary-reporter.js';
