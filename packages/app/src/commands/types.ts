/**
 * Command types and interfaces
 */

import type moment from 'moment-timezone';
import type { FeedRequest, OnThisDayResponse } from '@daybook/contracts';

/**
 * Where command output and errors are written; process.stdout and
 * process.stderr in production.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  columns?: number;
  isTTY?: boolean;
}

/**
 * Reads the current instant, in the named IANA zone when given.
 */
export type Clock = (timezone?: string) => moment.Moment;

/**
 * Anything that answers feed requests; OnThisDayService in production.
 */
export interface FeedSource {
  getFeed(request: FeedRequest): Promise<OnThisDayResponse>;
}
