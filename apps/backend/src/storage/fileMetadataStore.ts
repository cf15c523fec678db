import fs from 'fs';
import path from 'path';
import { resolveWithinDirectory } from '../utils/pathSecurity.js';
import { writeFileAtomic, TEMP_FILE_PREFIX } from '../utils/atomicWrite.js';
import { logger, errorMeta } from '../utils/logger.js';
import { parseRecord, serializeRecord, type PhotoRecord } from '../domain/photo/PhotoRecord.js';
import { MetadataError, StorageError, errnoCode, storageErrorFromFs } from './errors.js';
import { METADATA_SUFFIX, type MetadataStore } from './types.js';

/** One `<key>.metadata.json` document beside each payload file. */
export class FileMetadataStore implements MetadataStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(process.cwd(), rootDir);
  }

  private pathFor(key: string): string {
    try {
      return resolveWithinDirectory(this.rootDir, `${key}${METADATA_SUFFIX}`);
    } catch (error) {
      throw new StorageError('permission_denied', `Key escapes the upload root: ${key}`, { key, cause: error });
    }
  }

  async save(record: PhotoRecord): Promise<void> {
    const filePath = this.pathFor(record.key);
    try {
      await fs.promises.mkdir(this.rootDir, { recursive: true });
      await writeFileAtomic(filePath, serializeRecord(record));
    } catch (error) {
      throw storageErrorFromFs(error, record.key);
    }
  }

  async load(key: string): Promise<PhotoRecord> {
    const filePath = this.pathFor(key);
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') throw new MetadataError('not_found', key, { cause: error });
      throw storageErrorFromFs(error, key);
    }
    return parseRecord(raw, key);
  }

  async delete(key: string): Promise<void> {
    const filePath = this.pathFor(key);
    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return;
      throw storageErrorFromFs(error, key);
    }
  }

  async *list(): AsyncIterable<PhotoRecord> {
    let dir: fs.Dir;
    try {
      dir = await fs.promises.opendir(this.rootDir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return;
      throw storageErrorFromFs(error, null);
    }

    for await (const entry of dir) {
      if (!entry.isFile()) continue;
      if (entry.name.startsWith(TEMP_FILE_PREFIX)) continue;
      if (!entry.name.endsWith(METADATA_SUFFIX)) continue;

      const key = entry.name.slice(0, -METADATA_SUFFIX.length);
      try {
        yield await this.load(key);
      } catch (error) {
        // Deleted between readdir and read, or unreadable: skip just this record.
        if (error instanceof MetadataError) {
          logger.warn('photo.metadata.skipped', { key, reason: error.reason, ...errorMeta(error) });
          continue;
        }
        throw error;
      }
    }
  }
}
