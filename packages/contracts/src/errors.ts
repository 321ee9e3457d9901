/**
 * @fileoverview Error taxonomy for Daybook.
 *
 * Every failure the CLI can report is a DaybookError with a machine-readable
 * code, the pipeline stage that failed and a structured data payload.
 * Validation errors are raised before any network access; client, transport,
 * status and decode errors come from the On This Day provider.
 *
 * @module @daybook/contracts/errors
 */

/**
 * Pipeline stage an error was raised in.
 */
export type ErrorStage =
  | 'validation'
  | 'configuration'
  | 'client'
  | 'transport'
  | 'status'
  | 'decode';

/**
 * Base error class for all Daybook errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new DaybookError('CUSTOM_ERROR', 'validation', 'Something went wrong', {
 *   input: 'xyz',
 * });
 * ```
 */
export class DaybookError extends Error {
  /**
   * Machine-readable error code (e.g., 'UPSTREAM_STATUS').
   */
  readonly code: string;

  readonly stage: ErrorStage;

  /**
   * Structured context for logging and display.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(
    code: string,
    stage: ErrorStage,
    message: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DaybookError';
    this.code = code;
    this.stage = stage;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      stage: this.stage,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a language code is not exactly two ASCII letters.
 */
export class InvalidLanguageCodeError extends DaybookError {
  readonly input: string;

  constructor(input: string) {
    super(
      'INVALID_LANGUAGE_CODE',
      'validation',
      `'${input}' is not a valid ISO-639-1 language code (two ASCII letters)`,
      { input }
    );
    this.name = 'InvalidLanguageCodeError';
    this.input = input;
  }
}

/**
 * Thrown when a month/day pair does not exist in the reference leap year.
 *
 * @example
 * ```typescript
 * new InvalidDateError(4, 31).message // "'04-31' is not a valid calendar date"
 * ```
 */
export class InvalidDateError extends DaybookError {
  readonly month: number;
  readonly day: number;

  constructor(month: number, day: number) {
    super(
      'INVALID_DATE',
      'validation',
      `'${pad2(month)}-${pad2(day)}' is not a valid calendar date`,
      { month, day }
    );
    this.name = 'InvalidDateError';
    this.month = month;
    this.day = day;
  }
}

/**
 * Thrown when a category name is not one of events, births, deaths, holidays.
 */
export class InvalidCategoryError extends DaybookError {
  constructor(input: string, allowed: readonly string[]) {
    super(
      'INVALID_CATEGORY',
      'validation',
      `'${input}' is not a valid category (expected one of: ${allowed.join(', ')})`,
      { input, allowed }
    );
    this.name = 'InvalidCategoryError';
  }
}

/**
 * Thrown when configuration from the environment or flags is invalid.
 */
export class ConfigurationError extends DaybookError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', 'configuration', message, data);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the HTTP client cannot be constructed (bad base URL, bad options).
 */
export class HttpClientInitError extends DaybookError {
  constructor(message: string, data?: Record<string, unknown>, cause?: unknown) {
    super('HTTP_CLIENT_INIT', 'client', message, data, { cause });
    this.name = 'HttpClientInitError';
  }
}

/**
 * Thrown on transport failures: DNS, refused connection, timeout.
 */
export class NetworkError extends DaybookError {
  /**
   * Transport error code when known (e.g., 'ECONNABORTED', 'ENOTFOUND').
   */
  readonly transportCode?: string;

  constructor(
    message: string,
    data: { requestUrl: string; transportCode?: string; [key: string]: unknown },
    cause?: unknown
  ) {
    super('NETWORK_ERROR', 'transport', message, data, { cause });
    this.name = 'NetworkError';
    this.transportCode = data.transportCode;
  }
}

/**
 * Thrown when the API answers with a non-2xx status.
 */
export class UpstreamStatusError extends DaybookError {
  readonly statusCode: number;

  constructor(
    message: string,
    data: { statusCode: number; statusText?: string; requestUrl: string; [key: string]: unknown }
  ) {
    super('UPSTREAM_STATUS', 'status', message, data);
    this.name = 'UpstreamStatusError';
    this.statusCode = data.statusCode;
  }
}

/**
 * Thrown when the response body is not JSON or does not have the expected shape.
 */
export class DecodeError extends DaybookError {
  constructor(
    message: string,
    data?: { issues?: string[]; requestUrl?: string; [key: string]: unknown },
    cause?: unknown
  ) {
    super('DECODE_ERROR', 'decode', message, data, { cause });
    this.name = 'DecodeError';
  }
}

export function isDaybookError(error: unknown): error is DaybookError {
  return error instanceof DaybookError;
}

export function isInvalidDateError(error: unknown): error is InvalidDateError {
  return error instanceof InvalidDateError;
}

export function isInvalidLanguageCodeError(error: unknown): error is InvalidLanguageCodeError {
  return error instanceof InvalidLanguageCodeError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isUpstreamStatusError(error: unknown): error is UpstreamStatusError {
  return error instanceof UpstreamStatusError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
