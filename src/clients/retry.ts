/**
 * Retry logic with exponential backoff for platform API calls.
 *
 * Features:
 * - Exponential backoff with jitter
 * - Respects Retry-After from the platform
 * - Only retries on retryable errors (429, 5xx, network)
 */

import { PlatformApiError } from '../errors.js';

export interface RetryOptions {
  maxRetries?: number;         // default: 3
  initialDelayMs?: number;     // default: 1000
  maxDelayMs?: number;         // default: 30000
  backoffMultiplier?: number;  // default: 2
  retryableStatuses?: number[];
  onRetry?: (error: Error, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error, opts.retryableStatuses) || attempt >= opts.maxRetries) {
        throw error;
      }

      const retryAfterMs = error instanceof PlatformApiError ? error.retryAfterMs : undefined;
      const baseDelay =
        retryAfterMs ?? calculateBackoff(attempt, opts.initialDelayMs, opts.backoffMultiplier);
      const delayMs = Math.min(addJitter(baseDelay), opts.maxDelayMs);

      if (options.onRetry && error instanceof Error) {
        options.onRetry(error, attempt + 1);
      }

      await sleep(delayMs);
    }
  }
}

/**
 * Check if an error is retryable.
 */
export function isRetryableError(error: unknown, retryableStatuses: number[]): boolean {
  if (error instanceof PlatformApiError) {
    return error.statusCode !== undefined && retryableStatuses.includes(error.statusCode);
  }

  // Network errors (fetch failures, timeouts)
  if (error instanceof Error) {
    return (
      error.name === 'TimeoutError' ||
      error.message.includes('fetch failed') ||
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('ECONNRESET') ||
      error.message.includes('ETIMEDOUT') ||
      error.message.includes('ENOTFOUND')
    );
  }

  return false;
}

/**
 * Parse a Retry-After header value (seconds) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function calculateBackoff(attempt: number, initialDelayMs: number, multiplier: number): number {
  return initialDelayMs * Math.pow(multiplier, attempt);
}

/**
 * Add jitter to prevent thundering herd.
 * Returns a value between 0.5x and 1.5x the input.
 */
function addJitter(delayMs: number): number {
  const jitterFactor = 0.5 + Math.random();
  return Math.floor(delayMs * jitterFactor);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
