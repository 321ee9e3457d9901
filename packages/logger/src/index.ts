/**
 * @fileoverview Public API exports for @daybook/logger
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, describeError } from './errorHandler.js';
export type { FatalEventSource, GlobalHandlerOptions } from './errorHandler.js';

export { renderPrettyLine } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
