/**
 * @fileoverview Custom Winston formats for the Daybook logger.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Fields printed up front, in this order, by the pretty format.
 */
const CONTEXT_FIELDS: readonly string[] = ['component', 'category', 'language'];

/**
 * Fields winston manages itself; never echoed as key=value pairs.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Timestamp and error serialization shared by every output format.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders one log record as a single human-readable line.
 *
 * @example
 * ```typescript
 * // [2026-10-18T15:37:00.000+00:00] debug: Cache hit component=onthisday-service language=de key="de:events:2:29"
 * ```
 */
export function renderPrettyLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const field of CONTEXT_FIELDS) {
    const value = info[field];
    if (value !== undefined && value !== null && value !== '') {
      context.push(`${field}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.has(key) || CONTEXT_FIELDS.includes(key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  const stack = info['stack'];
  return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
}

/**
 * Human-readable output without colors (files and custom streams).
 */
export const plainPrint = format.printf((info) => renderPrettyLine(info));

/**
 * Human-readable output for the terminal.
 */
export const prettyPrint = format.combine(format.colorize(), plainPrint);
