import { randomBytes } from 'crypto';
import { open, stat, unlink } from 'fs/promises';
import { SECURE_OVERWRITE_BYTES, ioFailure } from '@ledgerlock/types';
import { isNotFound } from '../utils/index.js';

/**
 * Overwrite the first `min(size, overwriteBytes)` bytes of a file with random
 * data in place, flush, then unlink it.
 *
 * @returns `true` when a file was destroyed, `false` when it was already gone
 * @throws StatementError of kind `IOFailure` when overwrite or unlink fails
 */
export async function secureDelete(
  filePath: string,
  overwriteBytes: number = SECURE_OVERWRITE_BYTES
): Promise<boolean> {
  try {
    const fileStat = await stat(filePath);
    const length = Math.min(fileStat.size, overwriteBytes);

    if (length > 0) {
      const handle = await open(filePath, 'r+');
      try {
        await handle.write(randomBytes(length), 0, length, 0);
        await handle.sync();
      } finally {
        await handle.close();
      }
    }

    await unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw ioFailure(error);
  }
}
