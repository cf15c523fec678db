import { z } from 'zod';

export const ImageContentTypeSchema = z.enum([
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
  'image/bmp',
  'image/tiff',
]);

export const StorageKindSchema = z.enum(['local', 's3']);

export const HealthStatusSchema = z.enum(['healthy', 'unhealthy']);

export type ImageContentType = z.infer<typeof ImageContentTypeSchema>;
export type StorageKind = z.infer<typeof StorageKindSchema>;
export type HealthStatus = z.infer<typeof HealthStatusSchema>;
