import type { LiveLogEntry, LogSink } from '@vies-batch/contracts';
import { clockTime, type Logger } from '@vies-batch/shared';

/**
 * Render one entry as a single text line:
 * `[10:04:05] REQUEST GET https://… (attempt 1/2)`.
 */
export function formatLogLine(entry: LiveLogEntry): string {
  const time = clockTime(new Date(entry.timestamp));
  const body = entry.body !== undefined ? ` ${entry.body.replace(/\s*\n\s*/g, ' ').trim()}` : '';
  return `[${time}] ${entry.kind.toUpperCase()} ${entry.message}${body}`;
}

/**
 * Keeps the live log in memory for display and export.
 */
export class MemoryLogSink implements LogSink {
  private readonly buffer: LiveLogEntry[] = [];
  private readonly maxEntries: number;

  constructor(options?: { maxEntries?: number }) {
    this.maxEntries = options?.maxEntries ?? 10_000;
  }

  write(entry: LiveLogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxEntries) {
      this.buffer.splice(0, this.buffer.length - this.maxEntries);
    }
  }

  entries(): readonly LiveLogEntry[] {
    return [...this.buffer];
  }

  lines(): string[] {
    return this.buffer.map(formatLogLine);
  }

  /**
   * Whole log as text, one entry per line, with a trailing newline.
   */
  toText(): string {
    return this.buffer.length === 0 ? '' : `${this.lines().join('\n')}\n`;
  }

  clear(): void {
    this.buffer.length = 0;
  }

  get size(): number {
    return this.buffer.length;
  }
}

/**
 * Forwards formatted lines to a process logger at debug level.
 */
export class LoggerLogSink implements LogSink {
  constructor(private readonly logger: Logger) {}

  write(entry: LiveLogEntry): void {
    this.logger.debug(formatLogLine(entry));
  }
}

/**
 * Dispatches every entry to several sinks.
 */
export class CompositeLogSink implements LogSink {
  private readonly sinks: LogSink[];

  constructor(sinks: LogSink[]) {
    this.sinks = sinks;
  }

  write(entry: LiveLogEntry): void {
    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

export const noopLogSink: LogSink = {
  write: () => undefined,
};
