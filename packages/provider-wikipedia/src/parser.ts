/**
 * @fileoverview Decoder for On This Day response bodies.
 *
 * @module @daybook/provider-wikipedia/parser
 */

import { z } from 'zod';
import { DecodeError, type OnThisDayResponse } from '@daybook/contracts';

const datedEntrySchema = z.object({
  year: z.number().int(),
  text: z.string(),
});

const holidayEntrySchema = z.object({
  text: z.string(),
});

/**
 * Categories the API leaves out (or sends as null) decode as empty arrays.
 * Unknown fields, such as the linked page summaries, are dropped.
 */
export const onThisDaySchema = z.object({
  events: z.array(datedEntrySchema).nullish().transform((entries) => entries ?? []),
  births: z.array(datedEntrySchema).nullish().transform((entries) => entries ?? []),
  deaths: z.array(datedEntrySchema).nullish().transform((entries) => entries ?? []),
  holidays: z.array(holidayEntrySchema).nullish().transform((entries) => entries ?? []),
});

/**
 * Formats zod issues as `path: message` lines.
 */
function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parses and validates a response body.
 *
 * @throws {DecodeError} If the body is not JSON or does not match the feed shape
 *
 * @example
 * ```typescript
 * decodeOnThisDay('{"events":[{"year":1990,"text":"A"}]}');
 * // { events: [{ year: 1990, text: 'A' }], births: [], deaths: [], holidays: [] }
 * ```
 */
export function decodeOnThisDay(body: string, requestUrl?: string): OnThisDayResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(
      'Invalid JSON returned by the On This Day API',
      { requestUrl, bodyPreview: body.slice(0, 120) },
      error
    );
  }

  const result = onThisDaySchema.safeParse(payload);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new DecodeError(
      `Unexpected response from the On This Day API (${issues[0] ?? 'invalid shape'})`,
      { requestUrl, issues }
    );
  }

  return result.data;
}
