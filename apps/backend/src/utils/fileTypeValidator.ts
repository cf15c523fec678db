/**
 * Magic bytes (file signatures) for image formats.
 * -1 in a pattern means "any value" (wildcard).
 */
const MAGIC_BYTES: Record<string, number[][]> = {
  'image/jpeg': [[0xff, 0xd8, 0xff]],
  'image/png': [[0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
  'image/gif': [
    [0x47, 0x49, 0x46, 0x38, 0x37, 0x61], // GIF87a
    [0x47, 0x49, 0x46, 0x38, 0x39, 0x61], // GIF89a
  ],
  'image/webp': [
    [0x52, 0x49, 0x46, 0x46, -1, -1, -1, -1, 0x57, 0x45, 0x42, 0x50], // RIFF....WEBP
  ],
  'image/bmp': [[0x42, 0x4d]],
  'image/tiff': [
    [0x49, 0x49, 0x2a, 0x00], // little-endian
    [0x4d, 0x4d, 0x00, 0x2a], // big-endian
  ],
};

/** Number of leading bytes the detector needs to see. */
export const IMAGE_HEADER_LENGTH = 12;

function matchesMagicBytes(header: Uint8Array, pattern: number[]): boolean {
  if (header.length < pattern.length) {
    return false;
  }

  for (let i = 0; i < pattern.length; i++) {
    if (pattern[i] !== -1 && header[i] !== pattern[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Detect the image type from its first bytes.
 *
 * @returns Detected MIME type or null if the bytes match no known image signature
 */
export function detectImageType(header: Uint8Array): string | null {
  for (const [mimeType, patterns] of Object.entries(MAGIC_BYTES)) {
    for (const pattern of patterns) {
      if (matchesMagicBytes(header, pattern)) {
        return mimeType;
      }
    }
  }
  return null;
}

export function hasKnownSignature(mimeType: string): boolean {
  return Object.prototype.hasOwnProperty.call(MAGIC_BYTES, mimeType);
}
