import { z } from 'zod';
import { PhotoIdSchema } from '../../entities/photo.js';
import { createSuccessSchema } from '../../common/responses.js';

export const DeletePhotoParamsSchema = z.object({
  photoId: PhotoIdSchema,
});

export const DeletePhotoResponseSchema = createSuccessSchema(
  z.object({
    id: PhotoIdSchema,
    deleted: z.literal(true),
  })
);

export type DeletePhotoParams = z.infer<typeof DeletePhotoParamsSchema>;
export type DeletePhotoResponse = z.infer<typeof DeletePhotoResponseSchema>;
