export {
  Monitor,
  type MonitorDeps,
  type RunOptions,
  type RunResult,
  type QueryListing,
} from './monitor.js';
export { applyDateFilter, parseLastRun, searchWindowStart, type WindowOptions } from './date-filter.js';
export { runExtensions, type ExtensionOutcome } from './extensions.js';
