/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@daybook/contracts';
import type { Logger } from '@daybook/logger';
import { configSchema, envMapping, stringSettings, type Config } from './schema.js';

type RawConfigValue = string | number | boolean | RawConfig;

interface RawConfig {
  [key: string]: RawConfigValue;
}

export type Environment = Record<string, string | undefined>;

/**
 * Load configuration from environment and defaults
 *
 * @throws {ConfigurationError} If a variable fails validation
 */
export function loadConfig(env: Environment = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    // Blank lines in .env count as unset
    if (value !== undefined && value !== '') {
      setNestedProperty(
        rawConfig,
        configPath,
        stringSettings.has(configPath) ? value : parseEnvValue(value)
      );
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: RawConfigValue): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    apiBaseUrl: config.api.baseUrl ?? 'per-language default',
    timeoutMs: config.api.timeoutMs,
    cache: {
      ttlMs: config.cache.ttlMs,
      cacheFailures: config.cache.cacheFailures,
    },
    language: config.history.language,
    timezone: config.clock.timezone ?? 'local',
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? 'none',
    },
  };
}

export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
