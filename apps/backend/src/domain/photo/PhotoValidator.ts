import { detectImageType, hasKnownSignature } from '../../utils/fileTypeValidator.js';
import { getSafeExtension } from '../../utils/pathSecurity.js';
import { PhotoValidationError } from './errors.js';
import { extensionsForContentType, type PhotoPolicy } from './policy.js';

export type UploadCandidate = {
  contentType: string;
  sizeBytes: number;
  originalFilename?: string;
  /** First bytes of the payload, when available, for a signature check. */
  header?: Uint8Array;
};

export function normalizeContentType(contentType: string): string {
  return String(contentType || '')
    .split(';')[0]
    .trim()
    .toLowerCase();
}

/**
 * Accept or reject an upload before any storage I/O happens.
 * Throws `PhotoValidationError` with reason `unsupported_type`, `empty` or `too_large`.
 */
export function validateUpload(candidate: UploadCandidate, policy: PhotoPolicy): void {
  const contentType = normalizeContentType(candidate.contentType);
  if (!policy.allowedContentTypes.includes(contentType)) {
    throw new PhotoValidationError(
      'unsupported_type',
      `MIME type '${contentType || 'unknown'}' not allowed. Allowed types: ${policy.allowedContentTypes.join(', ')}`,
      { contentType, allowedContentTypes: [...policy.allowedContentTypes] }
    );
  }

  const extension = getSafeExtension(candidate.originalFilename ?? '');
  const hasExtension = Boolean(candidate.originalFilename?.match(/\.[^./\\]+$/));
  if (hasExtension && !policy.allowedExtensions.includes(extension)) {
    throw new PhotoValidationError(
      'unsupported_type',
      `File extension not allowed. Allowed extensions: ${policy.allowedExtensions.join(', ')}`,
      { extension: extension || null, allowedExtensions: [...policy.allowedExtensions] }
    );
  }

  const declaredExtensions = extensionsForContentType(contentType);
  if (hasExtension && declaredExtensions.length > 0 && !declaredExtensions.includes(extension)) {
    throw new PhotoValidationError(
      'unsupported_type',
      `File extension ${extension} does not match content type ${contentType}`,
      { extension, contentType, expectedExtensions: [...declaredExtensions] }
    );
  }

  if (!Number.isFinite(candidate.sizeBytes) || candidate.sizeBytes <= 0) {
    throw new PhotoValidationError('empty', 'Empty file not allowed', { sizeBytes: 0 });
  }

  if (candidate.sizeBytes > policy.maxFileSizeBytes) {
    throw PhotoValidationError.tooLarge(policy.maxFileSizeBytes, candidate.sizeBytes);
  }

  // Types configured beyond the built-in signature table are trusted as declared.
  if (candidate.header && hasKnownSignature(contentType)) {
    const detected = detectImageType(candidate.header);
    if (detected !== contentType) {
      throw new PhotoValidationError(
        'unsupported_type',
        detected
          ? `File content is ${detected}, but it was declared as ${contentType}`
          : 'File content is not a recognized image',
        { contentType, detectedType: detected }
      );
    }
  }
}
