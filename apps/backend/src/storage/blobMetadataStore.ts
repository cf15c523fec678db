import { logger, errorMeta } from '../utils/logger.js';
import { parseRecord, serializeRecord, type PhotoRecord } from '../domain/photo/PhotoRecord.js';
import { MetadataError, StorageError } from './errors.js';
import type { MetadataStore, StorageBackend } from './types.js';

const DOCUMENT_SUFFIX = '.json';

/**
 * Metadata documents kept as `<key>.json` objects in their own storage namespace
 * (for S3: a separate key prefix next to the payloads).
 */
export class BlobMetadataStore implements MetadataStore {
  constructor(private readonly documents: StorageBackend) {}

  async save(record: PhotoRecord): Promise<void> {
    const body = Buffer.from(serializeRecord(record), 'utf8');
    await this.documents.put(`${record.key}${DOCUMENT_SUFFIX}`, body, 'application/json');
  }

  async load(key: string): Promise<PhotoRecord> {
    let body: Buffer;
    try {
      body = await this.documents.get(`${key}${DOCUMENT_SUFFIX}`);
    } catch (error) {
      if (error instanceof StorageError && error.reason === 'not_found') {
        throw new MetadataError('not_found', key, { cause: error });
      }
      if (error instanceof StorageError && error.reason === 'corrupt') {
        throw new MetadataError('corrupt', key, { cause: error });
      }
      throw error;
    }
    return parseRecord(body.toString('utf8'), key);
  }

  async delete(key: string): Promise<void> {
    await this.documents.delete(`${key}${DOCUMENT_SUFFIX}`);
  }

  async *list(): AsyncIterable<PhotoRecord> {
    for await (const documentKey of this.documents.listKeys()) {
      if (!documentKey.endsWith(DOCUMENT_SUFFIX)) continue;
      const key = documentKey.slice(0, -DOCUMENT_SUFFIX.length);
      try {
        yield await this.load(key);
      } catch (error) {
        if (error instanceof MetadataError) {
          logger.warn('photo.metadata.skipped', { key, reason: error.reason, ...errorMeta(error) });
          continue;
        }
        throw error;
      }
    }
  }
}
