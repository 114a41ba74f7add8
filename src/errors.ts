/**
 * Error types raised outside the transformation core.
 */

/** Invalid or missing configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A query group that includes itself, directly or through other groups. */
export class GroupCycleError extends ConfigError {
  constructor(public readonly path: string[]) {
    super(`Query group cycle detected: ${path.join(' -> ')}`);
    this.name = 'GroupCycleError';
  }
}

/** Non-2xx response from a scan-data platform. */
export class PlatformApiError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'PlatformApiError';
  }
}
