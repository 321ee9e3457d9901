/**
 * History command implementation
 */

import type { FeedRequest, HistoryQuery } from '@daybook/contracts';
import { resolveTargetDate } from '@daybook/clock';
import { createChildLogger, type Logger } from '@daybook/logger';
import { formatHistory, formatHistoryJson, monthDayKey } from '../formatters/history-formatter.js';
import { withSpinner, type Spinner } from '../ui/spinner.js';
import type { Clock, FeedSource } from './types.js';

export interface HistoryCommandConfig {
  service: FeedSource;
  clock: Clock;
  logger: Logger;
}

export interface HistoryCommandOptions {
  query: HistoryQuery;
  /** Terminal width in columns */
  width: number;
  json?: boolean;
  limit?: number;
  color?: boolean;
  /** Zone used to decide what "today" is */
  timezone?: string;
  spinner?: Spinner;
}

/**
 * `history` command - On This Day entries for a date, category and language
 */
export class HistoryCommand {
  readonly name = 'history';
  readonly description = 'Show what happened on this day in history';

  private readonly service: FeedSource;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: HistoryCommandConfig) {
    this.service = config.service;
    this.clock = config.clock;
    this.logger = createChildLogger(config.logger, { component: 'history-command' });
  }

  /**
   * Validates the date, fetches the feed and renders it.
   *
   * @throws {InvalidDateError} Before any network access, if month and day do not form a date
   * @throws {NetworkError | UpstreamStatusError | DecodeError} If the fetch fails
   */
  async execute(options: HistoryCommandOptions): Promise<string> {
    const startTime = Date.now();
    const { query } = options;

    const date = resolveTargetDate(
      { month: query.month, day: query.day },
      this.clock(options.timezone)
    );
    const request: FeedRequest = { language: query.language, category: query.category, ...date };

    this.logger.info('Executing history command', { ...request });

    const response = await withSpinner(
      options.spinner,
      `Fetching ${query.category} for ${monthDayKey(date)} in '${query.language}'...`,
      () => this.service.getFeed(request)
    );

    this.logger.debug('History fetched', {
      category: query.category,
      duration_ms: Date.now() - startTime,
    });

    if (options.json) {
      return formatHistoryJson(response, {
        category: query.category,
        date,
        language: query.language,
        limit: options.limit,
      });
    }

    return formatHistory(response, {
      category: query.category,
      date,
      width: options.width,
      color: options.color === true,
      limit: options.limit,
    });
  }
}
