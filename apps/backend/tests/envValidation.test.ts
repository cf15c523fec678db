import { parseEnv, photoPolicyFromEnv, storageConfigFromEnv, corsOriginsFromEnv, type EnvSource } from '../src/config/env.js';

function parsed(source: EnvSource) {
  const result = parseEnv(source);
  if (!result.success) throw result.error;
  return result.data;
}

function issues(source: EnvSource) {
  const result = parseEnv(source);
  if (result.success) throw new Error('expected env validation to fail');
  return result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

describe('env validation', () => {
  it('applies defaults for a bare environment', () => {
    const env = parsed({});
    expect(env).toMatchObject({
      PORT: 8000,
      NODE_ENV: 'development',
      UPLOAD_STORAGE: 'local',
      UPLOAD_DIR: './uploads/photos',
      MAX_FILE_SIZE: 104857600,
      S3_FORCE_PATH_STYLE: false,
      SHUTDOWN_TIMEOUT_MS: 30000,
    });
    expect(storageConfigFromEnv(env)).toEqual({ kind: 'local', rootDir: './uploads/photos' });
    expect(corsOriginsFromEnv(env)).toEqual([]);
  });

  it('requires a bucket for s3 storage', () => {
    expect(issues({ UPLOAD_STORAGE: 's3' })).toEqual([
      { path: 'S3_BUCKET', message: 'S3_BUCKET is required when UPLOAD_STORAGE=s3' },
    ]);
  });

  it('requires static credentials in pairs', () => {
    expect(issues({ S3_ACCESS_KEY_ID: 'test-key' })).toEqual([
      { path: 'S3_SECRET_ACCESS_KEY', message: 'S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY must be set together' },
    ]);
  });

  it('rejects content types without a known image format', () => {
    expect(issues({ ALLOWED_CONTENT_TYPES: 'image/png, image/heic' })).toEqual([
      { path: 'ALLOWED_CONTENT_TYPES', message: 'Unsupported content types: image/heic' },
    ]);
  });

  it('rejects an unknown storage kind', () => {
    expect(issues({ UPLOAD_STORAGE: 'azure' }).map((i) => i.path)).toEqual(['UPLOAD_STORAGE']);
  });

  it('derives the s3 storage config', () => {
    const env = parsed({
      UPLOAD_STORAGE: 's3',
      S3_BUCKET: 'photos-bucket',
      S3_REGION: 'eu-central-1',
      S3_ENDPOINT: 'http://localhost:9000',
      S3_KEY_PREFIX: 'prod',
      S3_FORCE_PATH_STYLE: 'true',
      S3_ACCESS_KEY_ID: 'test-key',
      S3_SECRET_ACCESS_KEY: 'test-secret',
    });
    expect(storageConfigFromEnv(env)).toEqual({
      kind: 's3',
      s3: {
        bucket: 'photos-bucket',
        region: 'eu-central-1',
        endpoint: 'http://localhost:9000',
        keyPrefix: 'prod',
        publicBaseUrl: undefined,
        forcePathStyle: true,
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      },
    });
  });

  it('leaves credentials to the default provider chain when none are configured', () => {
    const config = storageConfigFromEnv(parsed({ UPLOAD_STORAGE: 's3', S3_BUCKET: 'photos-bucket' }));
    expect(config.kind === 's3' && config.s3.credentials).toBeUndefined();
  });

  it('derives the photo policy', () => {
    const policy = photoPolicyFromEnv(
      parsed({ MAX_FILE_SIZE: '5242880', ALLOWED_CONTENT_TYPES: 'image/png,IMAGE/JPEG' })
    );
    expect(policy).toEqual({
      maxFileSizeBytes: 5242880,
      allowedContentTypes: ['image/png', 'image/jpeg'],
      allowedExtensions: ['.png', '.jpg', '.jpeg'],
    });
  });

  it('parses CORS origins as a list', () => {
    expect(corsOriginsFromEnv(parsed({ CORS_ORIGINS: 'https://a.example, https://b.example,' }))).toEqual([
      'https://a.example',
      'https://b.example',
    ]);
  });
});
