import { GalleryService } from '../src/domain/photo/GalleryService.js';
import { PhotoService } from '../src/domain/photo/PhotoService.js';
import { BlobMetadataStore } from '../src/storage/blobMetadataStore.js';
import { StorageError } from '../src/storage/errors.js';
import { PartialDeleteError, PhotoNotFoundError, PhotoUnavailableError } from '../src/domain/photo/errors.js';
import type { PhotoRecord } from '../src/domain/photo/PhotoRecord.js';
import { MemoryStorageBackend } from './mocks/memoryStorage.js';

let payloads: MemoryStorageBackend;
let documents: MemoryStorageBackend;
let metadata: BlobMetadataStore;

async function seed(key: string, createdAt: string, opts: { payload?: boolean } = {}): Promise<PhotoRecord> {
  const record: PhotoRecord = {
    key,
    originalFilename: `${key}`,
    contentType: 'image/png',
    sizeBytes: 3,
    album: null,
    description: null,
    tags: [],
    createdAt: new Date(createdAt),
    storageLocation: payloads.locate(key),
  };
  if (opts.payload ?? true) {
    await payloads.put(key, Buffer.from('png'), 'image/png');
  }
  await metadata.save(record);
  return record;
}

beforeEach(() => {
  payloads = new MemoryStorageBackend('memory');
  documents = new MemoryStorageBackend('meta');
  metadata = new BlobMetadataStore(documents);
});

describe('GalleryService', () => {
  it('lists newest first and breaks ties by key', async () => {
    await seed('old.png', '2026-01-01T00:00:00.000Z');
    await seed('b.png', '2026-03-01T00:00:00.000Z');
    await seed('a.png', '2026-03-01T00:00:00.000Z');
    await seed('new.png', '2026-05-01T00:00:00.000Z');

    const page = await new GalleryService({ payloads, metadata }).listGallery();

    expect(page.items.map((i) => i.record.key)).toEqual(['new.png', 'a.png', 'b.png', 'old.png']);
    expect(page).toMatchObject({ total: 4, page: 1, pageSize: 20, hasMore: false });
  });

  it('paginates and only probes the visible page', async () => {
    for (let day = 1; day <= 5; day++) {
      await seed(`p${day}.png`, `2026-01-0${day}T00:00:00.000Z`);
    }
    const exists = vi.spyOn(payloads, 'exists');
    const get = vi.spyOn(payloads, 'get');

    const page = await new GalleryService({ payloads, metadata }).listGallery({ page: 2, pageSize: 2 });

    expect(page.items.map((i) => i.record.key)).toEqual(['p3.png', 'p2.png']);
    expect(page).toMatchObject({ total: 5, page: 2, pageSize: 2, hasMore: true });
    expect(exists).toHaveBeenCalledTimes(2);
    expect(get).not.toHaveBeenCalled();
  });

  it('returns an empty page past the end', async () => {
    await seed('a.png', '2026-01-01T00:00:00.000Z');
    const page = await new GalleryService({ payloads, metadata }).listGallery({ page: 3, pageSize: 10 });
    expect(page.items).toEqual([]);
    expect(page).toMatchObject({ total: 1, hasMore: false });
  });

  it('marks entries whose payload is gone as unavailable', async () => {
    await seed('kept.png', '2026-01-02T00:00:00.000Z');
    await seed('lost.png', '2026-01-01T00:00:00.000Z', { payload: false });

    const page = await new GalleryService({ payloads, metadata }).listGallery();

    expect(page.items.map((i) => [i.record.key, i.available, i.location])).toEqual([
      ['kept.png', true, 'memory://kept.png'],
      ['lost.png', false, 'memory://lost.png'],
    ]);
  });

  it('clamps out-of-range paging input', async () => {
    const page = await new GalleryService({ payloads, metadata }).listGallery({ page: 0, pageSize: 500 });
    expect(page).toMatchObject({ page: 1, pageSize: 100, total: 0, hasMore: false });
  });
});

describe('PhotoService', () => {
  let service: PhotoService;

  beforeEach(() => {
    service = new PhotoService({ payloads, metadata });
  });

  it('getPhoto returns the record with availability', async () => {
    const record = await seed('a.png', '2026-01-01T00:00:00.000Z');
    expect(await service.getPhoto('a.png')).toEqual({ record, location: 'memory://a.png', available: true });
  });

  it('getPhoto of an unknown id is PhotoNotFoundError', async () => {
    await expect(service.getPhoto('nope.png')).rejects.toBeInstanceOf(PhotoNotFoundError);
  });

  it('getPhotoImage returns the bytes', async () => {
    await seed('a.png', '2026-01-01T00:00:00.000Z');
    const image = await service.getPhotoImage('a.png');
    expect(image.body.toString()).toBe('png');
    expect(image.record.contentType).toBe('image/png');
  });

  it('getPhotoImage of a vanished payload is PhotoUnavailableError', async () => {
    await seed('a.png', '2026-01-01T00:00:00.000Z', { payload: false });
    await expect(service.getPhotoImage('a.png')).rejects.toBeInstanceOf(PhotoUnavailableError);
  });

  it('deletePhoto removes metadata and payload', async () => {
    await seed('a.png', '2026-01-01T00:00:00.000Z');
    await service.deletePhoto('a.png');

    expect(payloads.objects.size).toBe(0);
    expect(documents.objects.size).toBe(0);
    await expect(service.deletePhoto('a.png')).rejects.toBeInstanceOf(PhotoNotFoundError);
  });

  it('deletePhoto cleans up an orphaned payload', async () => {
    await payloads.put('orphan.png', Buffer.from('png'), 'image/png');
    await service.deletePhoto('orphan.png');
    expect(payloads.objects.size).toBe(0);
  });

  it('deletePhoto removes a corrupt metadata document', async () => {
    await payloads.put('a.png', Buffer.from('png'), 'image/png');
    await documents.put('a.png.json', Buffer.from('garbage'), 'application/json');

    await service.deletePhoto('a.png');

    expect(payloads.objects.size).toBe(0);
    expect(documents.objects.size).toBe(0);
  });

  it('deletePhoto reports a partial delete when the payload cannot be removed', async () => {
    await seed('a.png', '2026-01-01T00:00:00.000Z');
    payloads.failOn('delete', new StorageError('permission_denied', 'read-only'));

    const err = await service.deletePhoto('a.png').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PartialDeleteError);
    expect(err).toMatchObject({ metadataDeleted: true, payloadDeleted: false });
    expect(documents.objects.size).toBe(0);
    expect(payloads.objects.has('a.png')).toBe(true);
  });
});
