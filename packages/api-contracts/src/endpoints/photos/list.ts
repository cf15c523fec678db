import { z } from 'zod';
import { PhotoSchema } from '../../entities/photo.js';
import { PageQuerySchema } from '../../common/pagination.js';
import { createPaginatedSchema } from '../../common/responses.js';

export const ListPhotosQuerySchema = PageQuerySchema;

export const ListPhotosResponseSchema = createPaginatedSchema(PhotoSchema);

export type ListPhotosQuery = z.infer<typeof ListPhotosQuerySchema>;
export type ListPhotosResponse = z.infer<typeof ListPhotosResponseSchema>;
