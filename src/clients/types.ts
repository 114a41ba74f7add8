/**
 * Shared client types.
 */

import type { Platform } from '../types/config.js';
import type { RetryOptions } from './retry.js';

export interface ClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
}

/** A scan-data platform the monitor can query. */
export interface PlatformClient {
  readonly platform: Platform;
  /**
   * Run a search. Failures are logged and yield an empty list so one
   * failing query does not stop a run.
   */
  search(query: string, endpoint?: string): Promise<unknown>;
}

/** A platform that also serves scan screenshots. */
export interface ScreenshotSource {
  downloadScreenshot(scanId: string, outputPath: string): Promise<boolean>;
}
