/**
 * @fileoverview Request URL construction for the On This Day feed.
 *
 * @module @daybook/provider-wikipedia/url
 */

import { HttpClientInitError, type FeedRequest } from '@daybook/contracts';

/**
 * Path template below the host; month and day are unpadded.
 */
export const FEED_PATH = '/api/rest_v1/feed/onthisday';

/**
 * Default host for a language edition.
 *
 * @example
 * ```typescript
 * defaultBaseUrl('de')  // 'https://de.wikipedia.org'
 * ```
 */
export function defaultBaseUrl(language: string): string {
  return `https://${language}.wikipedia.org`;
}

/**
 * Validates a base URL override and strips trailing slashes.
 *
 * @throws {HttpClientInitError} If the value is not an absolute http(s) URL
 */
export function normalizeBaseUrl(baseUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (error) {
    throw new HttpClientInitError(`Invalid API base URL '${baseUrl}'`, { baseUrl }, error);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new HttpClientInitError(`Unsupported protocol in API base URL '${baseUrl}'`, {
      baseUrl,
      protocol: parsed.protocol,
    });
  }

  return baseUrl.replace(/\/+$/, '');
}

/**
 * Builds the feed URL for a request.
 *
 * @example
 * ```typescript
 * buildFeedUrl('https://en.wikipedia.org', {
 *   language: 'en',
 *   category: Category.Births,
 *   month: 2,
 *   day: 9,
 * });
 * // 'https://en.wikipedia.org/api/rest_v1/feed/onthisday/births/2/9'
 * ```
 */
export function buildFeedUrl(baseUrl: string, request: FeedRequest): string {
  return `${baseUrl}${FEED_PATH}/${request.category.toLowerCase()}/${request.month}/${request.day}`;
}
