/**
 * @fileoverview Main logger factory for Daybook.
 * Creates configured Winston logger instances with structured fields and
 * console, file or stream transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { standardFields, prettyPrint, plainPrint } from './formats.js';

const { format } = winston;

/**
 * Every level goes to stderr; stdout is reserved for command output.
 */
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false });
 * logger.debug('Fetching feed', { url });
 * ```
 *
 * @example
 * ```typescript
 * // With file transport and child logger
 * const logger = createLogger({ level: 'info', filePath: './logs/daybook.log' });
 * const clientLogger = createChildLogger(logger, { component: 'onthisday-client' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  const consoleFormat = format.combine(standardFields, json ? format.json() : prettyPrint);
  const plainFormat = format.combine(standardFields, json ? format.json() : plainPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: consoleFormat,
        stderrLevels: STDERR_LEVELS,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: plainFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: plainFormat,
      })
    );
  }

  // Winston warns when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    transports,
    // We handle this explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds the context fields to every entry.
 *
 * @example
 * ```typescript
 * const serviceLogger = createChildLogger(logger, { component: 'onthisday-service' });
 * serviceLogger.debug('Cache miss', { key });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
