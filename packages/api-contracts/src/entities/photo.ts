import { z } from 'zod';

export const PHOTO_ALBUM_MAX_LENGTH = 100;
export const PHOTO_DESCRIPTION_MAX_LENGTH = 1000;
export const PHOTO_TAGS_MAX_COUNT = 20;
export const PHOTO_TAG_MAX_LENGTH = 50;

// Name of the sidecar documents the local layout keeps beside each payload.
export const PHOTO_METADATA_SUFFIX = '.metadata.json';

// Storage keys are generated server-side; this only keeps hostile ids out of the storage layer.
export const PhotoIdSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Invalid photo id')
  .refine((id) => !id.includes('..'), 'Invalid photo id')
  .refine((id) => !id.toLowerCase().endsWith(PHOTO_METADATA_SUFFIX), 'Invalid photo id');

export const PhotoSchema = z.object({
  id: PhotoIdSchema,
  originalFilename: z.string(),
  contentType: z.string(),
  sizeBytes: z.number().int().positive(),
  album: z.string().nullable(),
  description: z.string().nullable(),
  tags: z.array(z.string().min(1).max(PHOTO_TAG_MAX_LENGTH)).max(PHOTO_TAGS_MAX_COUNT),
  createdAt: z.string().datetime(),
  imageUrl: z.string(),
  available: z.boolean(),
});

export type PhotoId = z.infer<typeof PhotoIdSchema>;
export type Photo = z.infer<typeof PhotoSchema>;
