/**
 * @fileoverview Public API for @daybook/app.
 *
 * @module @daybook/app
 */

export { runCli, createProgram, VERSION, DEFAULT_COLUMNS } from './program.js';
export type { CliDependencies } from './program.js';

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config, Environment } from './config/index.js';

export { TimeCommand } from './commands/time.command.js';
export type { TimeCommandConfig, TimeCommandOptions } from './commands/time.command.js';
export { HistoryCommand } from './commands/history.command.js';
export type { HistoryCommandConfig, HistoryCommandOptions } from './commands/history.command.js';
export { formatCommandError } from './commands/errors.js';
export type { Clock, FeedSource, OutputStream } from './commands/types.js';

export {
  formatHistory,
  formatHistoryJson,
  historyHeading,
  monthDayKey,
  selectEntries,
  textColumnWidth,
  MIN_TABLE_WIDTH,
  WRAP_MARGINS,
} from './formatters/history-formatter.js';
export { formatCurrentTime, formatTimeStatistics } from './formatters/time-formatter.js';
export { renderTable } from './formatters/table.js';
export type { TableRow, TableStyle } from './formatters/table.js';
export { wrapText } from './formatters/text-wrap.js';

export { Spinner, withSpinner, SPINNER_FRAMES } from './ui/spinner.js';
