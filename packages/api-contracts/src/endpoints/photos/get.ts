import { z } from 'zod';
import { PhotoIdSchema, PhotoSchema } from '../../entities/photo.js';
import { createSuccessSchema } from '../../common/responses.js';

export const GetPhotoParamsSchema = z.object({
  photoId: PhotoIdSchema,
});

export const GetPhotoResponseSchema = createSuccessSchema(PhotoSchema);

export type GetPhotoParams = z.infer<typeof GetPhotoParamsSchema>;
export type GetPhotoResponse = z.infer<typeof GetPhotoResponseSchema>;
