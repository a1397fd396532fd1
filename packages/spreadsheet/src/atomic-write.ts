import { randomUUID } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage, noopLogger, WriteError, type Logger } from '@vies-batch/shared';

/**
 * Write `data` to `filePath` all-or-nothing: the bytes go to a temp file in
 * the same directory, which is then renamed over the target. On failure the
 * temp file is removed and the target is left as it was.
 *
 * @throws WriteError when the temp file cannot be written or renamed
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  logger: Logger = noopLogger,
): Promise<void> {
  const target = path.resolve(filePath);
  const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID().slice(0, 8)}.tmp`);

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn('Could not remove temp file', { tempPath, error: errorMessage(cleanupError) });
    });
    throw new WriteError(`Cannot write ${target}: ${errorMessage(error)}`, target, { cause: error });
  }
}
