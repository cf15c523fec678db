import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '@photo-uploader/api-contracts';
import type { MetadataStore, StorageBackend } from '../../storage/types.js';
import type { PhotoRecord } from './PhotoRecord.js';

export type GalleryEntry = {
  record: PhotoRecord;
  location: string;
  available: boolean;
};

export type GalleryPage = {
  items: GalleryEntry[];
  total: number;
  page: number;
  pageSize: number;
  hasMore: boolean;
};

export type GalleryQuery = {
  page?: number;
  pageSize?: number;
};

export function compareNewestFirst(a: PhotoRecord, b: PhotoRecord): number {
  const diff = b.createdAt.getTime() - a.createdAt.getTime();
  if (diff !== 0) return diff;
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

export class GalleryService {
  constructor(
    private readonly deps: {
      payloads: StorageBackend;
      metadata: MetadataStore;
    }
  ) {}

  async listGallery(query: GalleryQuery = {}): Promise<GalleryPage> {
    const page = clampInt(query.page, 1, 1, Number.MAX_SAFE_INTEGER);
    const pageSize = clampInt(query.pageSize, DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE);

    const records: PhotoRecord[] = [];
    for await (const record of this.deps.metadata.list()) {
      records.push(record);
    }
    records.sort(compareNewestFirst);

    const start = (page - 1) * pageSize;
    const slice = records.slice(start, start + pageSize);

    // Only the visible page is probed; payload bytes are never read here.
    const items = await Promise.all(
      slice.map(async (record): Promise<GalleryEntry> => {
        const available = await this.deps.payloads.exists(record.key);
        return { record, location: this.deps.payloads.locate(record.key), available };
      })
    );

    return {
      items,
      total: records.length,
      page,
      pageSize,
      hasMore: start + slice.length < records.length,
    };
  }
}
