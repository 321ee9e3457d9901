/**
 * The `daybook` command-line program.
 *
 * `runCli` parses arguments, runs one command and resolves to the exit code;
 * it never calls process.exit, so tests drive it with in-memory streams.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { AxiosInstance } from 'axios';
import {
  Category,
  InvalidCategoryError,
  InvalidLanguageCodeError,
  parseCategory,
  parseLanguageCode,
} from '@daybook/contracts';
import { currentInstant } from '@daybook/clock';
import { createLogger, type Logger } from '@daybook/logger';
import {
  OnThisDayClient,
  OnThisDayService,
  ResponseCache,
  type FeedFetcher,
} from '@daybook/provider-wikipedia';
import { loadConfig, type Config, type Environment } from './config/index.js';
import { formatCommandError } from './commands/errors.js';
import { HistoryCommand } from './commands/history.command.js';
import { TimeCommand } from './commands/time.command.js';
import type { Clock, OutputStream } from './commands/types.js';
import { Spinner } from './ui/spinner.js';

export const VERSION = '0.1.0';

/**
 * Width assumed when stdout is not a terminal
 */
export const DEFAULT_COLUMNS = 80;

type GlobalOptions = {
  verbose?: boolean;
};

interface TimeCliOptions {
  statistics?: boolean;
  json?: boolean;
  tz?: string;
  color: boolean;
}

interface HistoryCliOptions {
  category: Category;
  language: string;
  month?: number;
  day?: number;
  quiet?: boolean;
  limit?: number;
  json?: boolean;
  color: boolean;
}

export interface CliDependencies {
  /** @default process.env */
  env?: Environment;
  /** @default process.stdout */
  stdout?: OutputStream;
  /** @default process.stderr */
  stderr?: OutputStream;
  /** @default currentInstant */
  clock?: Clock;
  /** Replaces the HTTP client entirely */
  fetcher?: FeedFetcher;
  /** axios instance for the default HTTP client */
  httpClient?: AxiosInstance;
  /** Replaces the logger built from configuration */
  logger?: Logger;
}

interface ProgramDependencies {
  stdout: OutputStream;
  stderr: OutputStream;
  clock: Clock;
  fetcher?: FeedFetcher;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

function parseIntegerOption(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return Number.parseInt(value, 10);
}

function parsePositiveIntegerOption(value: string): number {
  const parsed = parseIntegerOption(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

function parseLanguageOption(value: string): string {
  try {
    return parseLanguageCode(value);
  } catch (error) {
    if (error instanceof InvalidLanguageCodeError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

function parseCategoryOption(value: string): Category {
  try {
    return parseCategory(value);
  } catch (error) {
    if (error instanceof InvalidCategoryError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

/**
 * Builds the commander program. Exits and output are routed through the
 * given streams; errors surface as CommanderError.
 */
export function createProgram(config: Config, deps: ProgramDependencies): Command {
  const program = new Command();

  program
    .name('daybook')
    .description('Current time, time statistics and On This Day history')
    .version(VERSION, '-V, --version')
    .option('-v, --verbose', 'debug logging and detailed errors', false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        deps.stdout.write(str);
      },
      writeErr: (str) => {
        deps.stderr.write(str);
      },
    });

  const loggerFor = (): Logger =>
    deps.logger ??
    createLogger({
      level: program.opts<GlobalOptions>().verbose ? 'debug' : config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });

  const useColor = (requested: boolean): boolean => requested && deps.stdout.isTTY === true;

  program
    .command('time', { isDefault: true })
    .description('Show the current time (the default command)')
    .option('-s, --statistics', 'show day and year statistics', false)
    .option('--json', 'print JSON instead of text', false)
    .option('--tz <zone>', 'IANA time zone to use instead of the local one')
    .option('--no-color', 'disable colored output')
    .action((options: TimeCliOptions) => {
      const command = new TimeCommand({ clock: deps.clock, logger: loggerFor() });
      const output = command.execute({
        statistics: options.statistics,
        json: options.json,
        timezone: options.tz ?? config.clock.timezone,
        color: useColor(options.color),
      });
      deps.stdout.write(`${output}\n`);
    });

  program
    .command('history')
    .description('Show what happened on this day in history')
    .option(
      '-c, --category <name>',
      'events, births, deaths or holidays',
      parseCategoryOption,
      Category.Events
    )
    .option(
      '-l, --language <code>',
      'two-letter Wikipedia language code',
      parseLanguageOption,
      config.history.language
    )
    .option('-m, --month <n>', 'month (1-12) instead of the current one', parseIntegerOption)
    .option('-d, --day <n>', 'day of the month instead of the current one', parseIntegerOption)
    .option('-q, --quiet', 'do not show the progress spinner', false)
    .option('--limit <n>', 'show at most n entries', parsePositiveIntegerOption)
    .option('--json', 'print JSON instead of a table', false)
    .option('--no-color', 'disable colored output')
    .action(async (options: HistoryCliOptions) => {
      const logger = loggerFor();
      const client =
        deps.fetcher ??
        new OnThisDayClient({
          baseUrl: config.api.baseUrl,
          timeoutMs: config.api.timeoutMs,
          httpClient: deps.httpClient,
          logger,
        });
      const service = new OnThisDayService({
        client,
        cache: new ResponseCache({ ttlMs: config.cache.ttlMs }),
        cacheFailures: config.cache.cacheFailures,
        logger,
      });

      const color = useColor(options.color);
      const command = new HistoryCommand({ service, clock: deps.clock, logger });
      const output = await command.execute({
        query: {
          category: options.category,
          language: options.language,
          month: options.month,
          day: options.day,
        },
        width: deps.stdout.columns ?? DEFAULT_COLUMNS,
        json: options.json,
        limit: options.limit,
        color,
        timezone: config.clock.timezone,
        spinner:
          options.quiet || options.json ? undefined : new Spinner({ stream: deps.stderr, color }),
      });
      deps.stdout.write(`${output}\n`);
    });

  return program;
}

/**
 * Runs the CLI with user arguments (no node or script path) and resolves
 * to the process exit code.
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(process.argv.slice(2));
 * ```
 */
export async function runCli(
  args: readonly string[],
  dependencies: CliDependencies = {}
): Promise<number> {
  const deps: ProgramDependencies = {
    stdout: dependencies.stdout ?? process.stdout,
    stderr: dependencies.stderr ?? process.stderr,
    clock: dependencies.clock ?? currentInstant,
    fetcher: dependencies.fetcher,
    httpClient: dependencies.httpClient,
    logger: dependencies.logger,
  };

  let config: Config;
  try {
    config = loadConfig(dependencies.env ?? process.env, dependencies.logger);
  } catch (error) {
    deps.stderr.write(`${formatCommandError(error)}\n`);
    return 1;
  }

  const program = createProgram(config, deps);

  try {
    await program.parseAsync([...args], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const verbose = program.opts<GlobalOptions>().verbose === true;
    deps.stderr.write(`${formatCommandError(error, verbose)}\n`);
    return 1;
  }
}
