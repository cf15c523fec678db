export type PhotoPolicy = {
  maxFileSizeBytes: number;
  allowedContentTypes: readonly string[];
  allowedExtensions: readonly string[];
};

export const MAX_FILE_SIZE_BYTES = 100 * 1024 * 1024;

/** Canonical extension per image content type; used when the upload name has none. */
export const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/bmp': '.bmp',
  'image/tiff': '.tiff',
};

// Accepted spellings beyond the canonical extension.
const EXTENSION_ALIASES: Record<string, readonly string[]> = {
  'image/jpeg': ['.jpeg'],
  'image/tiff': ['.tif'],
};

export function isKnownImageType(contentType: string): boolean {
  return Object.prototype.hasOwnProperty.call(CONTENT_TYPE_EXTENSIONS, contentType);
}

/** Every extension spelling that names `contentType`, canonical first. */
export function extensionsForContentType(contentType: string): readonly string[] {
  const canonical = CONTENT_TYPE_EXTENSIONS[contentType];
  if (!canonical) return [];
  return [canonical, ...(EXTENSION_ALIASES[contentType] ?? [])];
}

export function buildPhotoPolicy(
  opts: { maxFileSizeBytes?: number; allowedContentTypes?: readonly string[] } = {}
): PhotoPolicy {
  const allowedContentTypes = opts.allowedContentTypes ?? Object.keys(CONTENT_TYPE_EXTENSIONS);
  const allowedExtensions: string[] = [];
  for (const contentType of allowedContentTypes) {
    allowedExtensions.push(...extensionsForContentType(contentType));
  }
  return {
    maxFileSizeBytes: opts.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES,
    allowedContentTypes,
    allowedExtensions,
  };
}

export const DEFAULT_PHOTO_POLICY: PhotoPolicy = buildPhotoPolicy();

export function formatMegabytes(bytes: number): string {
  const mb = bytes / 1024 / 1024;
  return `${Number.isInteger(mb) ? mb : mb.toFixed(1)}MB`;
}
