/**
 * Client for the Silent Push scan-data search API.
 *
 * Searches return the platform's response envelope untouched; the
 * assembler and IOC extractor know how to unwrap it.
 */

import { fetchOk, USER_AGENT } from './http.js';
import { withRetry } from './retry.js';
import { createLogger } from '../utils/logger.js';
import type { ClientOptions, PlatformClient } from './types.js';

const logger = createLogger('silentpush');

const DEFAULT_BASE_URL = 'https://api.silentpush.com/api/v1';
export const DEFAULT_SCANDATA_ENDPOINT = 'merge-api/explore/scandata/search/raw';
// Scan-data searches are slow; allow three minutes
const DEFAULT_TIMEOUT_MS = 180_000;
const RESULT_LIMIT = 1000;

export interface SearchRequest {
  url: string;
  body: { query: string; sort: string[] };
}

export class SilentPushClient implements PlatformClient {
  readonly platform = 'silentpush' as const;

  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: ClientOptions['retry'];

  constructor(apiKey?: string, options: ClientOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry;
  }

  /**
   * Build the request for a query without sending it.
   */
  buildRequest(query: string, endpoint: string = DEFAULT_SCANDATA_ENDPOINT): SearchRequest {
    const params = new URLSearchParams({
      limit: String(RESULT_LIMIT),
      skip: '0',
      with_metadata: '1',
    });
    const path = endpoint.replace(/^\/+/, '');
    return {
      url: `${this.baseUrl}/${path}?${params.toString()}`,
      body: { query, sort: ['scan_date/desc'] },
    };
  }

  async search(query: string, endpoint?: string): Promise<unknown> {
    if (!this.apiKey) {
      logger.error('SILENTPUSH_API_KEY is not set; skipping query');
      return [];
    }

    const request = this.buildRequest(query, endpoint);
    const apiKey = this.apiKey;
    try {
      return await withRetry(async () => {
        const response = await fetchOk(
          'Silent Push',
          request.url,
          {
            method: 'POST',
            headers: {
              'x-api-key': apiKey,
              'Content-Type': 'application/json',
              'User-Agent': USER_AGENT,
            },
            body: JSON.stringify(request.body),
          },
          this.timeoutMs,
        );
        const data: unknown = await response.json();
        return data;
      }, {
        ...this.retry,
        onRetry: (error, attempt) => logger.warn(`Retrying search (attempt ${attempt}): ${error.message}`),
      });
    } catch (err) {
      logger.error(`Error executing Silent Push query: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
  }
}
