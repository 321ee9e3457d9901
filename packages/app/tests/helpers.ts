import { createLogger, type Logger } from '@daybook/logger';
import type { OutputStream } from '../src/commands/types.js';

/**
 * Collects everything written to it.
 */
export class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];
  columns?: number;
  isTTY?: boolean;

  constructor(options: { columns?: number; isTTY?: boolean } = {}) {
    this.columns = options.columns;
    this.isTTY = options.isTTY;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export function silentLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}
