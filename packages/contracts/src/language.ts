/**
 * @fileoverview ISO-639-1 language code validation.
 *
 * @module @daybook/contracts/language
 */

import { InvalidLanguageCodeError } from './errors.js';

const LANGUAGE_CODE_PATTERN = /^[A-Za-z]{2}$/;

export function isValidLanguageCode(value: string): boolean {
  return LANGUAGE_CODE_PATTERN.test(value);
}

/**
 * Validates a language code and folds it to lowercase.
 *
 * Only the shape is checked (two ASCII letters); whether a Wikipedia edition
 * exists for the code is left to the API.
 *
 * @throws {InvalidLanguageCodeError} On wrong length, digits, symbols or non-ASCII letters
 *
 * @example
 * ```typescript
 * parseLanguageCode('EN')   // 'en'
 * parseLanguageCode('eng')  // throws InvalidLanguageCodeError
 * ```
 */
export function parseLanguageCode(value: string): string {
  if (!isValidLanguageCode(value)) {
    throw new InvalidLanguageCodeError(value);
  }
  return value.toLowerCase();
}
