import path from 'node:path';
import { writeFileAtomic } from './atomic-write.js';

/**
 * Anything that can render the live log as text, such as a MemoryLogSink.
 */
export interface LogTextSource {
  toText(): string;
}

/**
 * Save the live request log to a UTF-8 text file.
 *
 * @returns the absolute path written
 * @throws WriteError when the file cannot be written
 */
export async function exportLog(source: LogTextSource, filePath: string): Promise<string> {
  const target = path.resolve(filePath);
  await writeFileAtomic(target, source.toText());
  return target;
}
