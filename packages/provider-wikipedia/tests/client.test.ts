/**
 * @fileoverview Tests for the On This Day HTTP client.
 */

import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import {
  Category,
  DecodeError,
  HttpClientInitError,
  NetworkError,
  UpstreamStatusError,
  type FeedRequest,
} from '@daybook/contracts';
import { OnThisDayClient } from '../src/client.js';
import { createFakeHttp, jsonReply } from './fake-http.js';

const request: FeedRequest = { language: 'de', category: Category.Births, month: 2, day: 9 };

describe('OnThisDayClient', () => {
  describe('request construction', () => {
    it('should target the language edition with unpadded month and day', async () => {
      const fake = createFakeHttp(() => jsonReply({ births: [] }));
      const client = new OnThisDayClient({ httpClient: fake.http });

      await client.fetchFeed(request);

      expect(fake.calls).toHaveLength(1);
      expect(fake.calls[0]?.url).toBe(
        'https://de.wikipedia.org/api/rest_v1/feed/onthisday/births/2/9'
      );
      expect(fake.calls[0]?.method).toBe('get');
    });

    it('should use the base URL override for every language', async () => {
      const fake = createFakeHttp(() => jsonReply({}));
      const client = new OnThisDayClient({ httpClient: fake.http, baseUrl: 'http://localhost:8080/' });

      await client.fetchFeed({ language: 'fr', category: Category.Holidays, month: 10, day: 18 });

      expect(fake.calls[0]?.url).toBe(
        'http://localhost:8080/api/rest_v1/feed/onthisday/holidays/10/18'
      );
      expect(client.baseUrlFor('en')).toBe('http://localhost:8080');
    });

    it('should send the identifying header and the timeout', async () => {
      const fake = createFakeHttp(() => jsonReply({}));
      const client = new OnThisDayClient({ httpClient: fake.http, userAgent: 'daybook-test/1.0' });

      await client.fetchFeed(request);

      const config = fake.calls[0];
      expect(config?.headers.get('User-Agent')).toBe('daybook-test/1.0');
      expect(config?.headers.get('Accept')).toBe('application/json');
      expect(config?.timeout).toBe(10_000);
    });
  });

  describe('decoding', () => {
    it('should decode the requested category and default the rest', async () => {
      const fake = createFakeHttp(() =>
        jsonReply({
          births: [
            { year: 1900, text: 'Someone', pages: [{ title: 'Someone' }] },
            { year: 1950, text: 'Someone else' },
          ],
        })
      );
      const client = new OnThisDayClient({ httpClient: fake.http });

      const feed = await client.fetchFeed(request);

      expect(feed).toEqual({
        events: [],
        births: [
          { year: 1900, text: 'Someone' },
          { year: 1950, text: 'Someone else' },
        ],
        deaths: [],
        holidays: [],
      });
    });
  });

  describe('failures', () => {
    it('should raise UpstreamStatusError on a non-2xx status', async () => {
      const fake = createFakeHttp(() => ({ status: 404, statusText: 'Not Found', body: '{}' }));
      const client = new OnThisDayClient({ httpClient: fake.http });

      const error = await client.fetchFeed(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamStatusError);
      expect(error).toMatchObject({
        statusCode: 404,
        message: 'On This Day API returned HTTP 404 Not Found',
        stage: 'status',
      });
    });

    it('should raise DecodeError on a malformed body', async () => {
      const fake = createFakeHttp(() => ({ status: 200, body: '<html>oops</html>' }));
      const client = new OnThisDayClient({ httpClient: fake.http });

      const error = await client.fetchFeed(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({
        message: 'Invalid JSON returned by the On This Day API',
        stage: 'decode',
      });
    });

    it('should raise NetworkError with the transport code on a timeout', async () => {
      const fake = createFakeHttp(
        (config) => ({ error: new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', config) })
      );
      const client = new OnThisDayClient({ httpClient: fake.http });

      const error = await client.fetchFeed(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({
        transportCode: 'ECONNABORTED',
        message: 'Network error contacting the On This Day API: timeout of 10000ms exceeded',
        stage: 'transport',
      });
    });

    it('should raise NetworkError for non-axios failures', async () => {
      const fake = createFakeHttp(() => ({ error: new Error('getaddrinfo ENOTFOUND xx.wikipedia.org') }));
      const client = new OnThisDayClient({ httpClient: fake.http });

      const error = await client.fetchFeed(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ transportCode: undefined });
    });
  });

  describe('construction', () => {
    it('should reject an invalid base URL', () => {
      expect(() => new OnThisDayClient({ baseUrl: 'not a url' })).toThrow(HttpClientInitError);
      expect(() => new OnThisDayClient({ baseUrl: 'not a url' })).toThrow(
        "Invalid API base URL 'not a url'"
      );
    });

    it('should reject non-http protocols', () => {
      expect(() => new OnThisDayClient({ baseUrl: 'ftp://example.test' })).toThrow(
        "Unsupported protocol in API base URL 'ftp://example.test'"
      );
    });

    it('should reject a non-positive timeout', () => {
      expect(() => new OnThisDayClient({ timeoutMs: 0 })).toThrow(HttpClientInitError);
    });
  });
});
