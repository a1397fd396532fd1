/**
 * ID and time sources, injectable for deterministic tests.
 */

/**
 * IdGenerator interface for injectable ID generation.
 */
export interface IdGenerator {
  generate(prefix?: string): string;
}

/**
 * Clock interface for injectable time source.
 */
export interface Clock {
  now(): Date;
}

export const defaultClock: Clock = {
  now: () => new Date(),
};

/**
 * Timestamp + crypto random, e.g. `batch-lq2x4y-a1b2c3d4`.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const timestamp = Date.now().toString(36);
    const random = globalThis.crypto.randomUUID().slice(0, 8);
    return prefix ? `${prefix}-${timestamp}-${random}` : `${timestamp}-${random}`;
  },
};

/**
 * Generate a batch job id.
 */
export function generateBatchId(idGenerator: IdGenerator = defaultIdGenerator): string {
  return idGenerator.generate('batch');
}

/**
 * Local time as `yyyyMMdd_HHmmss`, used in default file names.
 *
 * @example
 * ```typescript
 * fileTimestamp(new Date(2024, 0, 5, 9, 3, 7)) // '20240105_090307'
 * ```
 */
export function fileTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Local time as `HH:mm:ss`, used in live log lines.
 */
export function clockTime(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
