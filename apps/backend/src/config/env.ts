import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { buildPhotoPolicy, isKnownImageType, MAX_FILE_SIZE_BYTES, type PhotoPolicy } from '../domain/photo/policy.js';
import type { StorageConfig } from '../storage/index.js';

const csv = (raw: string | undefined): string[] =>
  String(raw || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

const booleanFlag = z
  .string()
  .optional()
  .transform((raw) => ['1', 'true', 'yes', 'on'].includes(String(raw || '').trim().toLowerCase()));

const envSchemaBase = z.object({
  PORT: z.coerce.number().int().optional().default(8000),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  JSON_BODY_LIMIT: z.string().min(1).optional().default('1mb'),
  CORS_ORIGINS: z.string().optional(),

  UPLOAD_STORAGE: z.enum(['local', 's3']).optional().default('local'),
  UPLOAD_DIR: z.string().min(1).optional().default('./uploads/photos'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().optional().default(MAX_FILE_SIZE_BYTES),
  ALLOWED_CONTENT_TYPES: z.string().optional(),
  UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(300_000),
  UPLOAD_RATE_LIMIT_MAX: z.coerce.number().int().positive().optional().default(30),
  UPLOAD_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().optional().default(60_000),

  S3_BUCKET: z.string().min(1).optional(),
  S3_ACCESS_KEY_ID: z.string().min(1).optional(),
  S3_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  S3_PUBLIC_BASE_URL: z.string().url().optional(),
  S3_ENDPOINT: z.string().url().optional(),
  S3_REGION: z.string().min(1).optional().default('us-east-1'),
  S3_KEY_PREFIX: z.string().optional().default(''),
  S3_FORCE_PATH_STYLE: booleanFlag,

  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(30_000),
});

const envSchema = envSchemaBase.superRefine((env, ctx) => {
  if (env.UPLOAD_STORAGE === 's3' && !env.S3_BUCKET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'S3_BUCKET is required when UPLOAD_STORAGE=s3',
      path: ['S3_BUCKET'],
    });
  }
  if (Boolean(env.S3_ACCESS_KEY_ID) !== Boolean(env.S3_SECRET_ACCESS_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY must be set together',
      path: ['S3_SECRET_ACCESS_KEY'],
    });
  }
  const unknownTypes = csv(env.ALLOWED_CONTENT_TYPES)
    .map((t) => t.toLowerCase())
    .filter((t) => !isKnownImageType(t));
  if (unknownTypes.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unsupported content types: ${unknownTypes.join(', ')}`,
      path: ['ALLOWED_CONTENT_TYPES'],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export type EnvSource = Record<string, string | undefined>;

export function parseEnv(source: EnvSource) {
  return envSchema.safeParse(source);
}

export function validateEnv(source: EnvSource = process.env): Env {
  const result = parseEnv(source);
  if (!result.success) {
    logger.error('env.invalid', { errors: result.error.format() });
    process.exit(1);
  }
  return result.data;
}

export function photoPolicyFromEnv(env: Env): PhotoPolicy {
  const types = csv(env.ALLOWED_CONTENT_TYPES).map((t) => t.toLowerCase());
  return buildPhotoPolicy({
    maxFileSizeBytes: env.MAX_FILE_SIZE,
    allowedContentTypes: types.length > 0 ? types : undefined,
  });
}

export function storageConfigFromEnv(env: Env): StorageConfig {
  if (env.UPLOAD_STORAGE === 'local') {
    return { kind: 'local', rootDir: env.UPLOAD_DIR };
  }
  if (!env.S3_BUCKET) {
    // Guarded by the schema.
    throw new Error('S3_BUCKET is required when UPLOAD_STORAGE=s3');
  }
  return {
    kind: 's3',
    s3: {
      bucket: env.S3_BUCKET,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT,
      keyPrefix: env.S3_KEY_PREFIX,
      publicBaseUrl: env.S3_PUBLIC_BASE_URL,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
      credentials:
        env.S3_ACCESS_KEY_ID && env.S3_SECRET_ACCESS_KEY
          ? { accessKeyId: env.S3_ACCESS_KEY_ID, secretAccessKey: env.S3_SECRET_ACCESS_KEY }
          : undefined,
    },
  };
}

export function corsOriginsFromEnv(env: Env): string[] {
  return csv(env.CORS_ORIGINS);
}
