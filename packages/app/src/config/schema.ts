/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { isValidLanguageCode } from '@daybook/contracts';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  api: z
    .object({
      /** Replaces https://{language}.wikipedia.org; checked when the history client is built */
      baseUrl: z.string().optional(),
      timeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),

  cache: z
    .object({
      ttlMs: z.number().int().nonnegative().default(24 * 60 * 60 * 1000),
      cacheFailures: z.boolean().default(true),
    })
    .default({}),

  history: z
    .object({
      language: z
        .string()
        .refine(isValidLanguageCode, { message: 'Expected a two-letter language code' })
        .transform((code) => code.toLowerCase())
        .default('en'),
    })
    .default({}),

  clock: z
    .object({
      timezone: z.string().optional(),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  DAYBOOK_API_BASE_URL: 'api.baseUrl',
  DAYBOOK_HTTP_TIMEOUT_MS: 'api.timeoutMs',
  DAYBOOK_CACHE_TTL_MS: 'cache.ttlMs',
  DAYBOOK_CACHE_FAILURES: 'cache.cacheFailures',
  DAYBOOK_LANGUAGE: 'history.language',
  DAYBOOK_TIMEZONE: 'clock.timezone',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};

/**
 * Settings that stay strings even when they look numeric or boolean
 */
export const stringSettings: ReadonlySet<string> = new Set([
  'api.baseUrl',
  'history.language',
  'clock.timezone',
  'logging.filePath',
]);
