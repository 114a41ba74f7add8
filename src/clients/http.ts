/**
 * fetch wrapper shared by the platform clients.
 */

import { PlatformApiError } from '../errors.js';
import { parseRetryAfter } from './retry.js';

export const USER_AGENT = 'scanwatch/0.1';

/**
 * fetch with a timeout; non-2xx responses become PlatformApiError.
 */
export async function fetchOk(
  label: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new PlatformApiError(
      `${label} API error (${response.status}): ${body.substring(0, 500)}`,
      response.status,
      parseRetryAfter(response.headers.get('retry-after')),
    );
  }

  return response;
}
