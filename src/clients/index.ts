export { UrlscanClient, encodeImageToBase64 } from './urlscan-client.js';
export { SilentPushClient, DEFAULT_SCANDATA_ENDPOINT } from './silentpush-client.js';
export { withRetry, isRetryableError, parseRetryAfter, type RetryOptions } from './retry.js';
export type { ClientOptions, PlatformClient, ScreenshotSource } from './types.js';
