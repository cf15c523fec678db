import { z } from 'zod';
import { HealthStatusSchema, StorageKindSchema } from '../common/enums.js';

export const HealthSchema = z.object({
  status: HealthStatusSchema,
  storage: StorageKindSchema,
  timestamp: z.string().datetime(),
  error: z.string().optional(),
});

export type Health = z.infer<typeof HealthSchema>;
