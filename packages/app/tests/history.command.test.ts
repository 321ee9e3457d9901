/**
 * Tests for the history command
 */

import { describe, it, expect, vi } from 'vitest';
import moment from 'moment-timezone';
import {
  Category,
  InvalidDateError,
  NetworkError,
  emptyOnThisDayResponse,
} from '@daybook/contracts';
import { HistoryCommand } from '../src/commands/history.command.js';
import type { FeedSource } from '../src/commands/types.js';
import { silentLogger } from './helpers.js';

const today = (): moment.Moment => moment.utc('2026-02-09T10:00:00');

function setup(getFeed = vi.fn<FeedSource['getFeed']>().mockResolvedValue(emptyOnThisDayResponse())) {
  const command = new HistoryCommand({ service: { getFeed }, clock: today, logger: silentLogger() });
  return { command, getFeed };
}

describe('HistoryCommand', () => {
  it("should request today's date when no overrides are given", async () => {
    const { command, getFeed } = setup();

    await command.execute({ query: { category: Category.Births, language: 'en' }, width: 80 });

    expect(getFeed).toHaveBeenCalledWith({
      language: 'en',
      category: Category.Births,
      month: 2,
      day: 9,
    });
  });

  it('should override month and day independently', async () => {
    const { command, getFeed } = setup();

    await command.execute({
      query: { category: Category.Events, language: 'fr', month: 3 },
      width: 80,
    });

    expect(getFeed).toHaveBeenCalledWith({
      language: 'fr',
      category: Category.Events,
      month: 3,
      day: 9,
    });
  });

  it('should accept February 29 in any year', async () => {
    const { command, getFeed } = setup();

    const output = await command.execute({
      query: { category: Category.Events, language: 'en', month: 2, day: 29 },
      width: 80,
    });

    expect(getFeed).toHaveBeenCalledTimes(1);
    expect(output.split('\n')[0]).toBe('On This Day: February 29');
  });

  it('should reject an invalid date before fetching', async () => {
    const { command, getFeed } = setup();

    await expect(
      command.execute({
        query: { category: Category.Events, language: 'en', month: 4, day: 31 },
        width: 80,
      })
    ).rejects.toThrow(InvalidDateError);
    expect(getFeed).not.toHaveBeenCalled();
  });

  it('should render JSON when asked', async () => {
    const { command } = setup(
      vi.fn<FeedSource['getFeed']>().mockResolvedValue({
        ...emptyOnThisDayResponse(),
        deaths: [{ year: 1881, text: 'Someone' }],
      })
    );

    const output = await command.execute({
      query: { category: Category.Deaths, language: 'en' },
      width: 80,
      json: true,
    });

    expect(JSON.parse(output)).toEqual({
      date: '02-09',
      language: 'en',
      category: 'deaths',
      entries: [{ year: 1881, text: 'Someone' }],
    });
  });

  it('should propagate fetch failures', async () => {
    const failure = new NetworkError('Network error contacting the On This Day API: timeout', {
      requestUrl: 'https://en.wikipedia.org/api/rest_v1/feed/onthisday/events/2/9',
      transportCode: 'ECONNABORTED',
    });
    const { command } = setup(vi.fn<FeedSource['getFeed']>().mockRejectedValue(failure));

    await expect(
      command.execute({ query: { category: Category.Events, language: 'en' }, width: 80 })
    ).rejects.toBe(failure);
  });
});
