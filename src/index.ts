/**
 * scanwatch library entry point.
 */

export * from './tlp/index.js';
export * from './normalization/index.js';
export * from './config/index.js';
export * from './extraction/index.js';
export * from './reporting/index.js';
export * from './clients/index.js';
export * from './monitor/index.js';
export { ConfigError, GroupCycleError, PlatformApiError } from './errors.js';
export { defangDomain, defangUrl } from './utils/defang.js';
export { formatTimestamp, parseIsoTimestamp, formatEpochSeconds } from './utils/dates.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export type * from './types/records.js';
export type * from './types/config.js';
export type * from './types/ioc.js';
export { IOC_KINDS, IOC_COLUMN_NAMES, IOC_FILE_STEMS } from './types/ioc.js';
