import { PHOTO_TAGS_MAX_COUNT, PHOTO_TAG_MAX_LENGTH } from '@photo-uploader/api-contracts';

export function normalizeOptionalText(v: unknown): string | null {
  const text = String(v ?? '')
    .replace(/\r\n/g, '\n')
    .trim();
  return text.length > 0 ? text : null;
}

/**
 * Accepts a comma-separated string or a list; returns trimmed, lower-cased, de-duplicated
 * tags in first-seen order. Over-long tags are cut, extra tags dropped.
 */
export function normalizeTags(raw: string | readonly string[] | undefined | null): string[] {
  if (!raw) return [];
  const parts = typeof raw === 'string' ? raw.split(',') : raw;

  const tags: string[] = [];
  for (const part of parts) {
    const tag = String(part).trim().toLowerCase().slice(0, PHOTO_TAG_MAX_LENGTH).trim();
    if (!tag || tags.includes(tag)) continue;
    tags.push(tag);
    if (tags.length >= PHOTO_TAGS_MAX_COUNT) break;
  }
  return tags;
}
