import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { LocalStorageBackend } from '../src/storage/localStorage.js';
import { StorageError } from '../src/storage/errors.js';

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

describe('LocalStorageBackend', () => {
  let root: string;
  let storage: LocalStorageBackend;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'photo-storage-'));
    storage = new LocalStorageBackend(path.join(root, 'photos'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('stores, reads and deletes a payload', async () => {
    await storage.put('a.jpg', Buffer.from('jpeg-bytes'), 'image/jpeg');

    expect(await storage.exists('a.jpg')).toBe(true);
    expect((await storage.get('a.jpg')).toString()).toBe('jpeg-bytes');
    expect(await fs.readFile(path.join(root, 'photos', 'a.jpg'), 'utf8')).toBe('jpeg-bytes');

    await storage.delete('a.jpg');
    expect(await storage.exists('a.jpg')).toBe(false);
  });

  it('leaves no temp files behind after a write', async () => {
    await storage.put('a.jpg', Buffer.from('x'), 'image/jpeg');
    expect(await fs.readdir(path.join(root, 'photos'))).toEqual(['a.jpg']);
  });

  it('deleting a missing key succeeds', async () => {
    await expect(storage.delete('missing.jpg')).resolves.toBeUndefined();
  });

  it('get of a missing key is a not_found StorageError', async () => {
    await fs.mkdir(path.join(root, 'photos'));
    const err = await storage.get('missing.jpg').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ reason: 'not_found', key: 'missing.jpg' });
  });

  it('rejects keys that escape the root', async () => {
    await expect(storage.put('../evil.jpg', Buffer.from('x'), 'image/jpeg')).rejects.toMatchObject({
      reason: 'permission_denied',
    });
    await expect(fs.access(path.join(root, 'evil.jpg'))).rejects.toThrow();
  });

  it('refuses keys that name sidecars or temp files', async () => {
    await fs.mkdir(path.join(root, 'photos'));
    await fs.writeFile(path.join(root, 'photos', 'a.jpg.metadata.json'), '{}');

    await expect(storage.exists('a.jpg.metadata.json')).rejects.toMatchObject({
      reason: 'permission_denied',
      key: 'a.jpg.metadata.json',
    });
    await expect(storage.delete('a.jpg.metadata.json')).rejects.toBeInstanceOf(StorageError);
    await expect(storage.put('.a.jpg.tmp-1', Buffer.from('x'), 'image/jpeg')).rejects.toMatchObject({
      reason: 'permission_denied',
    });
    expect(await fs.readdir(path.join(root, 'photos'))).toEqual(['a.jpg.metadata.json']);
  });

  it('lists payload keys only', async () => {
    await storage.put('b.png', Buffer.from('b'), 'image/png');
    await storage.put('a.jpg', Buffer.from('a'), 'image/jpeg');
    await fs.writeFile(path.join(root, 'photos', 'a.jpg.metadata.json'), '{}');
    await fs.writeFile(path.join(root, 'photos', '.a.jpg.tmp-123'), 'partial');
    await fs.mkdir(path.join(root, 'photos', 'nested'));

    expect((await collect(storage.listKeys())).sort()).toEqual(['a.jpg', 'b.png']);
  });

  it('lists nothing before the first upload', async () => {
    expect(await collect(storage.listKeys())).toEqual([]);
  });

  it('locate returns the absolute file path', () => {
    expect(storage.locate('a.jpg')).toBe(path.join(root, 'photos', 'a.jpg'));
  });

  it('checkHealth requires an existing directory', async () => {
    await expect(storage.checkHealth()).rejects.toMatchObject({ reason: 'not_found' });
    await fs.mkdir(path.join(root, 'photos'));
    await expect(storage.checkHealth()).resolves.toBeUndefined();
  });
});
