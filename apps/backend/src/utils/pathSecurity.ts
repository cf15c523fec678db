import path from 'path';

export const MAX_BASE_NAME_LENGTH = 50;

/**
 * Reduce an untrusted, user-supplied filename to a base name that is safe to embed in a
 * storage key: directory components and the extension are dropped, whitespace becomes `-`,
 * and everything outside `[A-Za-z0-9_-]` is removed.
 *
 * @returns the sanitized stem, or `fallback` when nothing usable is left
 */
export function sanitizeBaseName(filename: string, fallback = 'photo'): string {
  const lastSegment = String(filename ?? '').split(/[/\\]/).pop() ?? '';
  const ext = path.extname(lastSegment);
  const stem = ext ? lastSegment.slice(0, -ext.length) : lastSegment;

  const clean = stem
    .replace(/\s+/g, '-')
    .replace(/[^A-Za-z0-9_-]/g, '')
    .replace(/-{2,}/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '')
    .slice(0, MAX_BASE_NAME_LENGTH);

  return clean || fallback;
}

/**
 * Lower-cased extension (with leading dot) of the last path segment, or '' when the
 * filename has none or it contains anything but letters and digits.
 */
export function getSafeExtension(filename: string): string {
  const lastSegment = String(filename ?? '').split(/[/\\]/).pop() ?? '';
  const ext = path.extname(lastSegment).toLowerCase();
  if (!/^\.[a-z0-9]{1,10}$/.test(ext)) return '';
  return ext;
}

/**
 * Resolve `name` against `baseDir` and make sure the result stays inside it.
 * Throws on traversal (`..`, absolute paths, separators that escape the directory).
 */
export function resolveWithinDirectory(baseDir: string, name: string): string {
  if (!name || typeof name !== 'string') {
    throw new Error('Invalid file path: must be a non-empty string');
  }

  const resolvedBaseDir = path.resolve(baseDir);
  const resolvedFilePath = path.resolve(resolvedBaseDir, name);
  const relativePath = path.relative(resolvedBaseDir, resolvedFilePath);

  if (!relativePath || relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
    throw new Error(`Path traversal detected: ${name} resolves outside allowed directory ${baseDir}`);
  }

  return resolvedFilePath;
}
