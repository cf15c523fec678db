import { randomBytes } from 'crypto';
import { getSafeExtension, sanitizeBaseName } from '../../utils/pathSecurity.js';
import { NamingExhaustedError } from './errors.js';
import { CONTENT_TYPE_EXTENSIONS, DEFAULT_PHOTO_POLICY } from './policy.js';
import { normalizeContentType } from './PhotoValidator.js';

export const DEFAULT_KEY_ATTEMPTS = 5;

export type DeriveKeyParams = {
  originalFilename: string;
  contentType: string;
  timestamp: Date;
  /** Collision probe against the payload backend. */
  exists: (key: string) => Promise<boolean>;
  randomId?: () => string;
  maxAttempts?: number;
  allowedExtensions?: readonly string[];
};

export function randomDisambiguator(): string {
  return randomBytes(4).toString('hex');
}

/** `2026-10-19T10:15:00.123Z` → `20261019T101500123Z` (sorts lexicographically). */
export function formatKeyTimestamp(timestamp: Date): string {
  return timestamp.toISOString().replace(/[-:.]/g, '');
}

export function keyExtension(
  originalFilename: string,
  contentType: string,
  allowedExtensions: readonly string[] = DEFAULT_PHOTO_POLICY.allowedExtensions
): string {
  const fromName = getSafeExtension(originalFilename);
  if (fromName && allowedExtensions.includes(fromName)) return fromName;
  return CONTENT_TYPE_EXTENSIONS[normalizeContentType(contentType)] ?? '';
}

/**
 * Derive a storage key of the form `<timestamp>_<base>_<disambiguator><ext>`.
 *
 * The random part makes collisions unlikely; the `exists` probe is what actually
 * guarantees uniqueness. Each collision draws a new disambiguator, up to `maxAttempts`.
 */
export async function deriveKey(params: DeriveKeyParams): Promise<string> {
  const randomId = params.randomId ?? randomDisambiguator;
  const maxAttempts = params.maxAttempts ?? DEFAULT_KEY_ATTEMPTS;

  const prefix = formatKeyTimestamp(params.timestamp);
  const base = sanitizeBaseName(params.originalFilename);
  const ext = keyExtension(params.originalFilename, params.contentType, params.allowedExtensions);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const key = `${prefix}_${base}_${randomId()}${ext}`;
    if (!(await params.exists(key))) return key;
  }

  throw new NamingExhaustedError(maxAttempts);
}
