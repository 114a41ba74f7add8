/**
 * Unit tests for the urlscan client. fetch is stubbed; nothing leaves the
 * process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { UrlscanClient, encodeImageToBase64 } from '@/clients/urlscan-client.js';

const NO_RETRY = { retry: { maxRetries: 0 } };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

let fetchMock: ReturnType<typeof vi.fn>;
let workDir: string;

beforeEach(() => {
  fetchMock = vi.fn();
  vi.stubGlobal('fetch', fetchMock);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  workDir = mkdtempSync(join(tmpdir(), 'scanwatch-urlscan-'));
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
  rmSync(workDir, { recursive: true, force: true });
});

describe('UrlscanClient.search', () => {
  it('sends the encoded query with the API key and returns the results list', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ results: [{ task: { uuid: 'u1' } }], total: 1 }));
    const client = new UrlscanClient('test-secret', NO_RETRY);

    const results = await client.search('page.domain:evil.test AND date:>=2024-05-01');

    expect(results).toEqual([{ task: { uuid: 'u1' } }]);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://urlscan.io/api/v1/search/?q=page.domain%3Aevil.test%20AND%20date%3A%3E%3D2024-05-01',
      expect.objectContaining({
        headers: { 'User-Agent': 'scanwatch/0.1', 'API-Key': 'test-secret' },
      }),
    );
  });

  it('omits the key header when no key is configured', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ results: [] }));
    await new UrlscanClient(undefined, { ...NO_RETRY, baseUrl: 'http://scan.local' }).search('x');

    expect(fetchMock).toHaveBeenCalledWith(
      'http://scan.local/api/v1/search/?q=x',
      expect.objectContaining({ headers: { 'User-Agent': 'scanwatch/0.1' } }),
    );
  });

  it('returns an empty list when the response has no results', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: 'nothing' }));
    expect(await new UrlscanClient('test-secret', NO_RETRY).search('x')).toEqual([]);
  });

  it('returns an empty list on an API error', async () => {
    fetchMock.mockResolvedValue(new Response('server exploded', { status: 500 }));
    expect(await new UrlscanClient('test-secret', NO_RETRY).search('x')).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('UrlscanClient.downloadScreenshot', () => {
  it('writes the image and reports success', async () => {
    fetchMock.mockResolvedValue(new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
    const output = join(workDir, 'u1.png');

    const ok = await new UrlscanClient('test-secret', NO_RETRY).downloadScreenshot('u1', output);

    expect(ok).toBe(true);
    expect(fetchMock.mock.calls[0][0]).toBe('https://urlscan.io/screenshots/u1.png');
    expect([...readFileSync(output)]).toEqual([1, 2, 3]);
  });

  it('reports failure when the screenshot is missing', async () => {
    fetchMock.mockResolvedValue(new Response('not found', { status: 404 }));
    const ok = await new UrlscanClient('test-secret', NO_RETRY).downloadScreenshot('u1', join(workDir, 'u1.png'));
    expect(ok).toBe(false);
  });
});

describe('encodeImageToBase64', () => {
  it('encodes file contents', async () => {
    const path = join(workDir, 'image.png');
    writeFileSync(path, 'abc');
    expect(await encodeImageToBase64(path)).toBe('YWJj');
  });

  it('returns null for a missing file', async () => {
    expect(await encodeImageToBase64(join(workDir, 'missing.png'))).toBeNull();
  });
});
