import fs from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import { logger, errorMeta } from './logger.js';

/** Prefix shared by every in-flight temp file; directory listings skip dot-files. */
export const TEMP_FILE_PREFIX = '.';

export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const suffix = randomBytes(6).toString('hex');
  return path.join(dir, `${TEMP_FILE_PREFIX}${path.basename(filePath)}.tmp-${suffix}`);
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await fs.promises.unlink(tempPath);
  } catch (error) {
    logger.debug('storage.temp_cleanup_failed', { tempPath, ...errorMeta(error) });
  }
}

/**
 * Write `data` to a temp file in the target's directory, then rename it into place.
 * Readers see either the previous file or the complete new one, never a partial write.
 */
export async function writeFileAtomic(filePath: string, data: Buffer | string): Promise<void> {
  const tempPath = tempPathFor(filePath);
  try {
    await fs.promises.writeFile(tempPath, data, { flag: 'wx' });
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await removeTempFile(tempPath);
    throw error;
  }
}
