/**
 * @fileoverview Public API for @daybook/contracts.
 *
 * Shared types, the category layout table, input validators and the error
 * taxonomy used by every Daybook package.
 *
 * @module @daybook/contracts
 */

export {
  Category,
  CATEGORY_LAYOUTS,
  getCategoryLayout,
  getAllCategories,
  isValidCategory,
  parseCategory,
} from './categories.js';
export type { CategoryLayout, DatedCategoryLayout, UndatedCategoryLayout } from './categories.js';

export { emptyOnThisDayResponse } from './history.js';
export type {
  FeedRequest,
  HistoricalEntry,
  HistoryQuery,
  HolidayEntry,
  MonthDay,
  OnThisDayResponse,
} from './history.js';

export { isValidLanguageCode, parseLanguageCode } from './language.js';

export type { TimeStats } from './time.js';

export {
  DaybookError,
  InvalidLanguageCodeError,
  InvalidDateError,
  InvalidCategoryError,
  ConfigurationError,
  HttpClientInitError,
  NetworkError,
  UpstreamStatusError,
  DecodeError,
  isDaybookError,
  isInvalidDateError,
  isInvalidLanguageCodeError,
  isNetworkError,
  isUpstreamStatusError,
  isDecodeError,
} from './errors.js';
export type { ErrorStage } from './errors.js';
