/**
 * Time command implementation
 */

import { computeTimeStats } from '@daybook/clock';
import { createChildLogger, type Logger } from '@daybook/logger';
import { formatCurrentTime, formatTimeStatistics } from '../formatters/time-formatter.js';
import type { Clock } from './types.js';

export interface TimeCommandConfig {
  clock: Clock;
  logger: Logger;
}

export interface TimeCommandOptions {
  statistics?: boolean;
  json?: boolean;
  timezone?: string;
  color?: boolean;
}

/**
 * `time` command (also the default) - current time or time statistics
 */
export class TimeCommand {
  readonly name = 'time';
  readonly description = 'Show the current time, optionally with day and year statistics';

  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: TimeCommandConfig) {
    this.clock = config.clock;
    this.logger = createChildLogger(config.logger, { component: 'time-command' });
  }

  /**
   * @throws {ConfigurationError} If the time zone is unknown
   */
  execute(options: TimeCommandOptions = {}): string {
    this.logger.debug('Executing time command', {
      statistics: options.statistics === true,
      timezone: options.timezone ?? 'local',
    });

    const instant = this.clock(options.timezone);
    const format = options.json ? 'json' : 'text';
    const color = options.color === true;

    if (options.statistics) {
      return formatTimeStatistics(computeTimeStats(instant), format, color);
    }
    return formatCurrentTime(instant, format, color);
  }
}
