/**
 * Client for the urlscan.io search API.
 */

import { readFile, writeFile } from 'node:fs/promises';

import { fetchOk, USER_AGENT } from './http.js';
import { withRetry } from './retry.js';
import { isRawRecord } from '../normalization/classifier.js';
import { createLogger } from '../utils/logger.js';
import type { ClientOptions, PlatformClient, ScreenshotSource } from './types.js';

const logger = createLogger('urlscan');

const DEFAULT_BASE_URL = 'https://urlscan.io';
const DEFAULT_TIMEOUT_MS = 60_000;

export class UrlscanClient implements PlatformClient, ScreenshotSource {
  readonly platform = 'urlscan' as const;

  private readonly apiKey?: string;
  private readonly options: Required<Omit<ClientOptions, 'retry'>> & Pick<ClientOptions, 'retry'>;

  constructor(apiKey?: string, options: ClientOptions = {}) {
    this.apiKey = apiKey;
    this.options = {
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      retry: options.retry,
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (this.apiKey) headers['API-Key'] = this.apiKey;
    return headers;
  }

  /**
   * Run a search query and return its `results` list.
   */
  async search(query: string): Promise<unknown[]> {
    const url = `${this.options.baseUrl}/api/v1/search/?q=${encodeURIComponent(query)}`;
    try {
      const data: unknown = await withRetry(async () => {
        const response = await fetchOk('urlscan', url, { headers: this.headers() }, this.options.timeoutMs);
        return response.json();
      }, {
        ...this.options.retry,
        onRetry: (error, attempt) => logger.warn(`Retrying search (attempt ${attempt}): ${error.message}`),
      });

      if (isRawRecord(data) && Array.isArray(data.results)) {
        return data.results;
      }
      logger.warn('Search response had no results list');
      return [];
    } catch (err) {
      logger.error(`Error executing urlscan query: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
  }

  /**
   * Download the screenshot for a scan. Returns false on failure.
   */
  async downloadScreenshot(scanId: string, outputPath: string): Promise<boolean> {
    const url = `${this.options.baseUrl}/screenshots/${encodeURIComponent(scanId)}.png`;
    try {
      const response = await withRetry(
        () => fetchOk('urlscan', url, { headers: this.headers() }, this.options.timeoutMs),
        this.options.retry,
      );
      const bytes = Buffer.from(await response.arrayBuffer());
      await writeFile(outputPath, bytes);
      return true;
    } catch (err) {
      logger.warn(`Error downloading screenshot for ${scanId}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }
}

/**
 * Base64 of an image file, or null when it cannot be read.
 */
export async function encodeImageToBase64(imagePath: string): Promise<string | null> {
  try {
    const data = await readFile(imagePath);
    return data.toString('base64');
  } catch (err) {
    logger.warn(`Error encoding image ${imagePath} to Base64: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
