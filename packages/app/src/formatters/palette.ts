import chalk, { Chalk, type ChalkInstance } from 'chalk';

/**
 * Returns a chalk instance that styles only when `color` is set and the
 * terminal supports it.
 */
export function createPalette(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? chalk.level : 0 });
}
