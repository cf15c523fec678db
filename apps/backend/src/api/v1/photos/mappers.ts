import type { Photo } from '@photo-uploader/api-contracts';
import type { PhotoRecord } from '../../../domain/photo/PhotoRecord.js';

export const PHOTOS_BASE_PATH = '/api/v1/photos';

export function photoImageUrl(key: string): string {
  return `${PHOTOS_BASE_PATH}/${encodeURIComponent(key)}/image`;
}

// The raw storage location (filesystem path or bucket URL) is never exposed.
export function toPhotoDto(record: PhotoRecord, available: boolean): Photo {
  return {
    id: record.key,
    originalFilename: record.originalFilename,
    contentType: record.contentType,
    sizeBytes: record.sizeBytes,
    album: record.album,
    description: record.description,
    tags: [...record.tags],
    createdAt: record.createdAt.toISOString(),
    imageUrl: photoImageUrl(record.key),
    available,
  };
}
