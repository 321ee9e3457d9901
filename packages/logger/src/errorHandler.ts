/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections.
 * Logs the failure, then terminates the process.
 */

import type { Logger } from './types.js';

/**
 * Time to wait for the logger to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Anything that emits the fatal process events; `process` in production.
 */
export interface FatalEventSource {
  on(
    event: 'uncaughtException' | 'unhandledRejection',
    listener: (reason: unknown) => void
  ): unknown;
}

export interface GlobalHandlerOptions {
  /** @default process */
  source?: FatalEventSource;
  /** @default process.exit */
  exit?: (code: number) => void;
}

const attachedSources = new WeakSet<FatalEventSource>();

/**
 * Attaches fatal-error handlers. Each handler logs the error with its stack
 * and exits with code 1 once the logger has flushed. Attaching twice to the
 * same source logs a warning and does nothing.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): void {
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  if (attachedSources.has(source)) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  source.on('uncaughtException', (error: unknown) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1, exit);
  });

  source.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1, exit);
  });

  attachedSources.add(source);
  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
}

/**
 * Converts any thrown value into a loggable object.
 */
export function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

function gracefulExit(logger: Logger, exitCode: number, exit: (code: number) => void): void {
  const timeoutId = setTimeout(() => {
    exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    exit(exitCode);
  });

  logger.end();
}
