/**
 * Error display for CLI commands
 */

import { DaybookError } from '@daybook/contracts';

function formatDaybookError(error: DaybookError, verbose: boolean): string {
  const lines: string[] = [`Error: ${error.message}`];

  if (!verbose) {
    return lines.join('\n');
  }

  lines.push(`Code: ${error.code}`);
  lines.push(`Stage: ${error.stage}`);

  if (error.data && Object.keys(error.data).length > 0) {
    lines.push('Context:');
    for (const [key, value] of Object.entries(error.data)) {
      lines.push(`  ${key}: ${JSON.stringify(value)}`);
    }
  }

  if (error.cause instanceof Error) {
    lines.push('Caused by:');
    lines.push(`  ${error.cause.message}`);
  }

  return lines.join('\n');
}

/**
 * Create a friendly error message from any error
 *
 * @example
 * ```typescript
 * formatCommandError(new InvalidDateError(4, 31));
 * // "Error: '04-31' is not a valid calendar date"
 * ```
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (error instanceof DaybookError) {
    return formatDaybookError(error, verbose);
  }

  if (error instanceof Error) {
    const lines: string[] = [`Error: ${error.message}`];

    if (verbose && error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }

    return lines.join('\n');
  }

  return `Error: ${String(error)}`;
}
