import { IMAGE_HEADER_LENGTH } from '../../utils/fileTypeValidator.js';
import { logger, errorMeta } from '../../utils/logger.js';
import type { MetadataStore, StorageBackend } from '../../storage/types.js';
import { PhotoValidationError, UploadFailure, type UploadStage } from './errors.js';
import { normalizeOptionalText, normalizeTags } from './normalization.js';
import { deriveKey } from './photoKey.js';
import type { PhotoPolicy } from './policy.js';
import type { PhotoRecord } from './PhotoRecord.js';
import { normalizeContentType, validateUpload } from './PhotoValidator.js';

export type PhotoUploadInput = {
  originalFilename: string;
  contentType: string;
  body: Buffer;
  album?: string | null;
  description?: string | null;
  tags?: string | readonly string[] | null;
};

export type PhotoUploadDeps = {
  payloads: StorageBackend;
  metadata: MetadataStore;
  policy: PhotoPolicy;
  now?: () => Date;
  randomId?: () => string;
  maxKeyAttempts?: number;
};

/**
 * Runs one upload through validate → key → payload → metadata.
 *
 * The payload and metadata stores are independent, so the best this can promise is
 * at most one orphaned payload per failed upload: a metadata failure triggers a
 * compensating payload delete, and if that fails too the orphan is logged for cleanup.
 */
export class PhotoUploadService {
  private readonly now: () => Date;

  constructor(private readonly deps: PhotoUploadDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private transition(stage: UploadStage, meta: Record<string, unknown> = {}): void {
    logger.debug('photo.upload.stage', { stage, ...meta });
  }

  async upload(input: PhotoUploadInput): Promise<PhotoRecord> {
    const { payloads, metadata, policy } = this.deps;
    const contentType = normalizeContentType(input.contentType);
    const sizeBytes = input.body.length;
    this.transition('received', { originalFilename: input.originalFilename, sizeBytes });

    try {
      validateUpload(
        {
          contentType,
          sizeBytes,
          originalFilename: input.originalFilename,
          header: input.body.subarray(0, IMAGE_HEADER_LENGTH),
        },
        policy
      );
    } catch (error) {
      if (error instanceof PhotoValidationError) {
        logger.info('photo.upload.rejected', { reason: error.reason, contentType, sizeBytes });
      }
      throw error;
    }
    this.transition('validated');

    const createdAt = this.now();
    let key: string;
    try {
      key = await deriveKey({
        originalFilename: input.originalFilename,
        contentType,
        timestamp: createdAt,
        exists: (candidate) => payloads.exists(candidate),
        randomId: this.deps.randomId,
        maxAttempts: this.deps.maxKeyAttempts,
        allowedExtensions: policy.allowedExtensions,
      });
    } catch (error) {
      logger.error('photo.upload.failed', { stage: 'key_assignment', ...errorMeta(error) });
      throw new UploadFailure({ stage: 'key_assignment', cause: error });
    }
    this.transition('key_assigned', { key });

    try {
      await payloads.put(key, input.body, contentType);
    } catch (error) {
      logger.error('photo.upload.failed', { stage: 'payload_store', key, ...errorMeta(error) });
      // A backend may have left a partial object behind.
      await this.discardPayload(key);
      throw new UploadFailure({ stage: 'payload_store', cause: error, key });
    }
    this.transition('payload_stored', { key });

    const record: PhotoRecord = {
      key,
      originalFilename: input.originalFilename,
      contentType,
      sizeBytes,
      album: normalizeOptionalText(input.album),
      description: normalizeOptionalText(input.description),
      tags: normalizeTags(input.tags),
      createdAt,
      storageLocation: payloads.locate(key),
    };

    try {
      await metadata.save(record);
    } catch (error) {
      logger.error('photo.upload.failed', { stage: 'metadata_store', key, ...errorMeta(error) });
      const compensated = await this.discardPayload(key);
      if (!compensated) {
        logger.error('photo.upload.orphaned_payload', {
          key,
          storage: payloads.kind,
          storageLocation: record.storageLocation,
        });
      }
      throw new UploadFailure({ stage: 'metadata_store', cause: error, key, orphaned: !compensated });
    }
    this.transition('metadata_stored', { key });

    logger.info('photo.upload.complete', { key, contentType, sizeBytes, storage: payloads.kind });
    this.transition('complete', { key });
    return record;
  }

  /** Best-effort payload removal; returns false when the delete itself failed. */
  private async discardPayload(key: string): Promise<boolean> {
    try {
      await this.deps.payloads.delete(key);
      return true;
    } catch (error) {
      logger.warn('photo.upload.compensation_failed', { key, ...errorMeta(error) });
      return false;
    }
  }
}
