/**
 * Terminal spinner shown on stderr while the history request is in flight.
 */

import { createPalette } from '../formatters/palette.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const CLEAR_LINE = '\r\x1b[2K';

export interface SpinnerStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface SpinnerOptions {
  stream: SpinnerStream;
  /** @default 120 */
  intervalMs?: number;
  color?: boolean;
}

/**
 * Draws nothing unless the stream is a TTY.
 */
export class Spinner {
  private readonly stream: SpinnerStream;
  private readonly intervalMs: number;
  private readonly paintFrame: (frame: string) => string;
  private timer: NodeJS.Timeout | undefined;
  private frame = 0;
  private message = '';

  constructor(options: SpinnerOptions) {
    this.stream = options.stream;
    this.intervalMs = options.intervalMs ?? 120;
    const paint = createPalette(options.color ?? false);
    this.paintFrame = (frame) => paint.blue(frame);
  }

  get isSpinning(): boolean {
    return this.timer !== undefined;
  }

  start(message: string): void {
    if (this.timer || this.stream.isTTY !== true) {
      return;
    }
    this.message = message;
    this.frame = 0;
    this.render();
    this.timer = setInterval(() => this.render(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.stream.write(CLEAR_LINE);
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length] ?? '';
    this.frame++;
    this.stream.write(`${CLEAR_LINE}${this.paintFrame(frame)} ${this.message}`);
  }
}

/**
 * Runs a task with the spinner going, and always stops it.
 */
export async function withSpinner<T>(
  spinner: Spinner | undefined,
  message: string,
  task: () => Promise<T>
): Promise<T> {
  spinner?.start(message);
  try {
    return await task();
  } finally {
    spinner?.stop();
  }
}
