import { z } from 'zod';
import { MetadataError } from '../../storage/errors.js';

export type PhotoRecord = {
  /** Storage key; doubles as the public photo id. */
  key: string;
  originalFilename: string;
  contentType: string;
  sizeBytes: number;
  album: string | null;
  description: string | null;
  tags: string[];
  createdAt: Date;
  storageLocation: string;
};

export const METADATA_DOCUMENT_VERSION = 1;

const MetadataDocumentSchema = z.object({
  version: z.literal(METADATA_DOCUMENT_VERSION),
  key: z.string().min(1),
  originalFilename: z.string(),
  contentType: z.string().min(1),
  sizeBytes: z.number().int().positive(),
  album: z.string().nullable(),
  description: z.string().nullable(),
  tags: z.array(z.string()).default([]),
  createdAt: z.string().datetime(),
  storageLocation: z.string(),
});

export function serializeRecord(record: PhotoRecord): string {
  const document: z.input<typeof MetadataDocumentSchema> = {
    version: METADATA_DOCUMENT_VERSION,
    key: record.key,
    originalFilename: record.originalFilename,
    contentType: record.contentType,
    sizeBytes: record.sizeBytes,
    album: record.album,
    description: record.description,
    tags: record.tags,
    createdAt: record.createdAt.toISOString(),
    storageLocation: record.storageLocation,
  };
  return JSON.stringify(document, null, 2);
}

/**
 * Parse one metadata document. Anything unreadable, schema-invalid, or filed under another
 * key is reported as `MetadataError('corrupt')`.
 */
export function parseRecord(raw: string, expectedKey: string): PhotoRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new MetadataError('corrupt', expectedKey, { cause: error });
  }

  const parsed = MetadataDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new MetadataError('corrupt', expectedKey, { cause: parsed.error });
  }
  if (parsed.data.key !== expectedKey) {
    throw new MetadataError('corrupt', expectedKey, {
      message: `Metadata for ${expectedKey} describes ${parsed.data.key}`,
    });
  }

  const { version: _version, createdAt, ...rest } = parsed.data;
  return { ...rest, createdAt: new Date(createdAt) };
}
