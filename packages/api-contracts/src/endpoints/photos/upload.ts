import { z } from 'zod';
import {
  PHOTO_ALBUM_MAX_LENGTH,
  PHOTO_DESCRIPTION_MAX_LENGTH,
  PhotoSchema,
} from '../../entities/photo.js';
import { createSuccessSchema } from '../../common/responses.js';

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((v) => (v ? v : undefined));

/** Text fields of the multipart form; the file itself is handled by the upload middleware. */
export const UploadPhotoBodySchema = z.object({
  album: optionalText(PHOTO_ALBUM_MAX_LENGTH),
  description: optionalText(PHOTO_DESCRIPTION_MAX_LENGTH),
  // Comma-separated list, normalized server-side.
  tags: z.string().max(2000).optional(),
});

export const UploadPhotoResponseSchema = createSuccessSchema(PhotoSchema);

export type UploadPhotoBody = z.infer<typeof UploadPhotoBodySchema>;
export type UploadPhotoResponse = z.infer<typeof UploadPhotoResponseSchema>;
