/**
 * @fileoverview Type definitions for the Daybook logger.
 */

import type { Writable } from 'node:stream';
import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that end the command
 * - 'warn': Conditions worth a look (cached failures, fallbacks)
 * - 'info': Normal operations
 * - 'debug': Request URLs, cache hits and misses, timings
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/daybook.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output. Console output always goes to stderr
   * so that it never interleaves with command output on stdout.
   * @default true
   */
  console?: boolean;

  /**
   * Optional writable stream receiving every log line (uncolored).
   */
  stream?: Writable;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const feedLogger = logger.child({ component: 'onthisday-service', language: 'de' });
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'cli', 'onthisday-client') */
  component?: string;

  /** Feed category context */
  category?: string;

  /** Language code context */
  language?: string;

  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so callers depend on this package only.
 */
export type Logger = WinstonLogger;
