/**
 * @fileoverview HTTP client for the Wikipedia On This Day feed.
 *
 * Makes exactly one GET per call with a bounded timeout. No retries: every
 * failure is reported to the caller as a NetworkError, UpstreamStatusError or
 * DecodeError.
 *
 * @module @daybook/provider-wikipedia/client
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import {
  HttpClientInitError,
  NetworkError,
  UpstreamStatusError,
  type FeedRequest,
  type OnThisDayResponse,
} from '@daybook/contracts';
import { createChildLogger, type Logger } from '@daybook/logger';
import { decodeOnThisDay } from './parser.js';
import { buildFeedUrl, defaultBaseUrl, normalizeBaseUrl } from './url.js';
import type { FeedFetcher, OnThisDayClientOptions } from './types.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'daybook/0.1.0';

export class OnThisDayClient implements FeedFetcher {
  private readonly http: AxiosInstance;
  private readonly baseUrlOverride?: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger?: Logger;

  /**
   * @throws {HttpClientInitError} If the base URL override or client options are invalid
   */
  constructor(options: OnThisDayClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger
      ? createChildLogger(options.logger, { component: 'onthisday-client' })
      : undefined;

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new HttpClientInitError('Request timeout must be a positive number of milliseconds', {
        timeoutMs: this.timeoutMs,
      });
    }

    if (options.baseUrl !== undefined) {
      this.baseUrlOverride = normalizeBaseUrl(options.baseUrl);
    }

    this.http = options.httpClient ?? axios.create();
  }

  /**
   * Base URL requests for a language are sent to.
   */
  baseUrlFor(language: string): string {
    return this.baseUrlOverride ?? defaultBaseUrl(language);
  }

  /**
   * Fetches and decodes the feed for one request.
   *
   * @throws {NetworkError} On DNS, connection or timeout failures
   * @throws {UpstreamStatusError} On any non-2xx status
   * @throws {DecodeError} If the body is not a valid feed
   */
  async fetchFeed(request: FeedRequest): Promise<OnThisDayResponse> {
    const url = buildFeedUrl(this.baseUrlFor(request.language), request);
    const startedAt = Date.now();

    this.logger?.debug('On This Day request', {
      url,
      language: request.language,
      category: request.category,
    });

    const response = await this.send(url);

    this.logger?.debug('On This Day response', {
      url,
      status: response.status,
      duration_ms: Date.now() - startedAt,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamStatusError(
        `On This Day API returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
        { statusCode: response.status, statusText: response.statusText, requestUrl: url }
      );
    }

    const body = typeof response.data === 'string' ? response.data : String(response.data);
    return decodeOnThisDay(body, url);
  }

  private async send(url: string): Promise<AxiosResponse<string>> {
    try {
      return await this.http.get<string>(url, {
        timeout: this.timeoutMs,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
        },
        // Status and JSON handling are ours, so that each failure keeps its own type
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error) {
      const transportCode = axios.isAxiosError(error) ? error.code : undefined;
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        `Network error contacting the On This Day API: ${reason}`,
        { requestUrl: url, transportCode },
        error
      );
    }
  }
}

/**
 * Creates a new On This Day client.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   baseUrl: process.env.DAYBOOK_API_BASE_URL,
 *   timeoutMs: 10_000,
 *   logger,
 * });
 * ```
 */
export function createClient(options: OnThisDayClientOptions = {}): OnThisDayClient {
  return new OnThisDayClient(options);
}
