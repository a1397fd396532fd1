/**
 * Chalk configuration with auto-detection for non-TTY environments
 */

import { Chalk, type ChalkInstance } from 'chalk';

export function shouldDisableColors(
  env: Readonly<Record<string, string | undefined>> = process.env,
  isTTY: boolean = process.stdout.isTTY === true,
): boolean {
  // Piped output
  if (!isTTY) {
    return true;
  }

  if (env.NO_COLOR) {
    return true;
  }

  if (env.FORCE_COLOR === '0' || env.FORCE_COLOR === 'false') {
    return true;
  }

  // Most CI environments set this
  if (env.CI && !env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk: ChalkInstance = shouldDisableColors() ? new Chalk({ level: 0 }) : new Chalk();

/**
 * Chalk without colors, for tests and plain output.
 */
export const plainChalk: ChalkInstance = new Chalk({ level: 0 });

export default configuredChalk;
