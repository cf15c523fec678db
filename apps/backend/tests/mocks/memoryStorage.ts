import { StorageError } from '../../src/storage/errors.js';
import type { StorageBackend } from '../../src/storage/types.js';

type Operation = 'put' | 'get' | 'exists' | 'delete' | 'listKeys' | 'checkHealth';

/** In-process stand-in for a storage backend with per-operation failure injection. */
export class MemoryStorageBackend implements StorageBackend {
  readonly kind = 'local' as const;
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();
  private readonly failures = new Map<Operation, Error>();

  constructor(private readonly name = 'memory') {}

  failOn(operation: Operation, error: Error = new StorageError('unavailable', `${operation} failed`)): void {
    this.failures.set(operation, error);
  }

  recover(operation?: Operation): void {
    if (operation) this.failures.delete(operation);
    else this.failures.clear();
  }

  private check(operation: Operation): void {
    const failure = this.failures.get(operation);
    if (failure) throw failure;
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    this.check('put');
    this.objects.set(key, { body: Buffer.from(body), contentType });
  }

  async get(key: string): Promise<Buffer> {
    this.check('get');
    const object = this.objects.get(key);
    if (!object) throw new StorageError('not_found', `Object not found: ${key}`, { key });
    return Buffer.from(object.body);
  }

  async exists(key: string): Promise<boolean> {
    this.check('exists');
    return this.objects.has(key);
  }

  async delete(key: string): Promise<void> {
    this.check('delete');
    this.objects.delete(key);
  }

  async *listKeys(): AsyncIterable<string> {
    this.check('listKeys');
    for (const key of [...this.objects.keys()]) {
      yield key;
    }
  }

  locate(key: string): string {
    return `${this.name}://${key}`;
  }

  async checkHealth(): Promise<void> {
    this.check('checkHealth');
  }
}
