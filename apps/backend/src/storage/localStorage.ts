import fs from 'fs';
import path from 'path';
import { resolveWithinDirectory } from '../utils/pathSecurity.js';
import { writeFileAtomic, TEMP_FILE_PREFIX } from '../utils/atomicWrite.js';
import { StorageError, errnoCode, storageErrorFromFs } from './errors.js';
import { METADATA_SUFFIX, type StorageBackend } from './types.js';

/**
 * Payloads as plain files directly under `rootDir`. Metadata sidecars
 * (`<key>.metadata.json`) may live in the same directory and are skipped by `listKeys`.
 */
export class LocalStorageBackend implements StorageBackend {
  readonly kind = 'local' as const;
  readonly rootDir: string;

  constructor(rootDir: string) {
    // NOTE: rootDir can be relative (to cwd) or absolute.
    this.rootDir = path.resolve(process.cwd(), rootDir);
  }

  private pathFor(key: string): string {
    // Sidecars and in-flight temp files share the directory but are never payloads.
    if (key.endsWith(METADATA_SUFFIX) || path.basename(key).startsWith(TEMP_FILE_PREFIX)) {
      throw new StorageError('permission_denied', `Reserved storage key: ${key}`, { key });
    }
    try {
      return resolveWithinDirectory(this.rootDir, key);
    } catch (error) {
      throw new StorageError('permission_denied', `Key escapes the upload root: ${key}`, { key, cause: error });
    }
  }

  async put(key: string, body: Buffer, _contentType: string): Promise<void> {
    const filePath = this.pathFor(key);
    try {
      await fs.promises.mkdir(this.rootDir, { recursive: true });
      await writeFileAtomic(filePath, body);
    } catch (error) {
      throw storageErrorFromFs(error, key);
    }
  }

  async get(key: string): Promise<Buffer> {
    const filePath = this.pathFor(key);
    try {
      return await fs.promises.readFile(filePath);
    } catch (error) {
      throw storageErrorFromFs(error, key);
    }
  }

  async exists(key: string): Promise<boolean> {
    const filePath = this.pathFor(key);
    try {
      const stat = await fs.promises.stat(filePath);
      return stat.isFile();
    } catch (error) {
      const mapped = storageErrorFromFs(error, key);
      if (mapped.reason === 'not_found') return false;
      throw mapped;
    }
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

  async *listKeys(): AsyncIterable<string> {
    let dir: fs.Dir;
    try {
      dir = await fs.promises.opendir(this.rootDir);
    } catch (error) {
      // Nothing uploaded yet.
      if (errnoCode(error) === 'ENOENT') return;
      throw storageErrorFromFs(error, null);
    }

    for await (const entry of dir) {
      if (!entry.isFile()) continue;
      if (entry.name.startsWith(TEMP_FILE_PREFIX)) continue;
      if (entry.name.endsWith(METADATA_SUFFIX)) continue;
      yield entry.name;
    }
  }

  locate(key: string): string {
    return this.pathFor(key);
  }

  async checkHealth(): Promise<void> {
    try {
      const stat = await fs.promises.stat(this.rootDir);
      if (!stat.isDirectory()) {
        throw new StorageError('corrupt', `Upload root is not a directory: ${this.rootDir}`);
      }
      await fs.promises.access(this.rootDir, fs.constants.R_OK | fs.constants.W_OK);
    } catch (error) {
      throw storageErrorFromFs(error, null);
    }
  }
}
