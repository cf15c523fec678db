import { logger, errorMeta } from '../../utils/logger.js';
import { MetadataError, StorageError } from '../../storage/errors.js';
import type { MetadataStore, StorageBackend } from '../../storage/types.js';
import { PartialDeleteError, PhotoNotFoundError, PhotoUnavailableError } from './errors.js';
import type { PhotoRecord } from './PhotoRecord.js';

export type PhotoDetail = {
  record: PhotoRecord;
  location: string;
  available: boolean;
};

export type PhotoImage = {
  record: PhotoRecord;
  body: Buffer;
};

export class PhotoService {
  constructor(
    private readonly deps: {
      payloads: StorageBackend;
      metadata: MetadataStore;
    }
  ) {}

  private async loadRecord(key: string): Promise<PhotoRecord> {
    try {
      return await this.deps.metadata.load(key);
    } catch (error) {
      if (error instanceof MetadataError && error.reason === 'not_found') {
        throw new PhotoNotFoundError(key);
      }
      throw error;
    }
  }

  async getPhoto(key: string): Promise<PhotoDetail> {
    const record = await this.loadRecord(key);
    const available = await this.deps.payloads.exists(key);
    return { record, location: this.deps.payloads.locate(key), available };
  }

  async getPhotoImage(key: string): Promise<PhotoImage> {
    const record = await this.loadRecord(key);
    try {
      const body = await this.deps.payloads.get(key);
      return { record, body };
    } catch (error) {
      if (error instanceof StorageError && error.reason === 'not_found') {
        logger.warn('photo.image.missing_payload', { key });
        throw new PhotoUnavailableError(key);
      }
      throw error;
    }
  }

  /**
   * Metadata goes first so a half-finished delete never leaves a listed photo without bytes.
   * A payload with no record is treated as an orphan and removed.
   */
  async deletePhoto(key: string): Promise<void> {
    const { metadata, payloads } = this.deps;

    let hadRecord = true;
    try {
      await metadata.load(key);
    } catch (error) {
      if (!(error instanceof MetadataError)) throw error;
      // A corrupt document is still a record to remove.
      hadRecord = error.reason === 'corrupt';
    }

    if (!hadRecord) {
      if (!(await payloads.exists(key))) {
        throw new PhotoNotFoundError(key);
      }
      logger.info('photo.delete.orphan_payload', { key });
      await payloads.delete(key);
      return;
    }

    await metadata.delete(key);

    try {
      await payloads.delete(key);
    } catch (error) {
      logger.error('photo.delete.partial', { key, metadataDeleted: true, payloadDeleted: false, ...errorMeta(error) });
      throw new PartialDeleteError({ key, metadataDeleted: true, payloadDeleted: false, cause: error });
    }

    logger.info('photo.delete.complete', { key });
  }
}
