import { fail, ok, type Result } from '../domain/errors';
import type { CollectionName, Entities } from '../domain/types';
import { decodeDocument, encodeDocument, type StoredDocument } from './codec';
import type { CreateEntry, PersistenceGateway, QueryOptions } from './types';

/**
 * In-process gateway. Documents are kept in their stored shape, so reads
 * and writes go through the same codec as the Firestore gateway. Each
 * compare-and-update and multi-document insert runs without yielding, which
 * makes it atomic here. Listings come back in document-id order.
 */
export class MemoryGateway implements PersistenceGateway {
  private collections = new Map<CollectionName, Map<string, StoredDocument>>();
  private unavailable = false;

  /** While set, every call answers Unavailable. */
  setUnavailable(value: boolean): void {
    this.unavailable = value;
  }

  /** Stores a raw document as-is, bypassing validation (legacy data). */
  putRaw(collection: CollectionName, id: string, document: StoredDocument): void {
    this.bucket(collection).set(id, { ...document });
  }

  getRaw(collection: CollectionName, id: string): StoredDocument | null {
    const document = this.bucket(collection).get(id);
    return document ? { ...document } : null;
  }

  async create<C extends CollectionName>(collection: C, entity: Entities[C]): Promise<Result<string>> {
    if (this.unavailable) return this.outage();
    const bucket = this.bucket(collection);
    if (bucket.has(entity.id)) {
      return fail('AlreadyExists', `${collection}/${entity.id} already exists`);
    }
    const encoded = encodeDocument(collection, entity);
    if (!encoded.ok) {
      return fail('Invalid', `Invalid ${collection} document`, encoded.issues);
    }
    bucket.set(entity.id, encoded.value);
    return ok(entity.id);
  }

  async createAll(entries: readonly CreateEntry[]): Promise<Result<string[]>> {
    if (this.unavailable) return this.outage();
    const staged: Array<{ collection: CollectionName; id: string; document: StoredDocument }> = [];
    for (const entry of entries) {
      const id = entry.entity.id;
      const taken =
        this.bucket(entry.collection).has(id) ||
        staged.some((write) => write.collection === entry.collection && write.id === id);
      if (taken) {
        return fail('AlreadyExists', `${entry.collection}/${id} already exists`);
      }
      const encoded = encodeDocument(entry.collection, entry.entity);
      if (!encoded.ok) {
        return fail('Invalid', `Invalid ${entry.collection} document`, encoded.issues);
      }
      staged.push({ collection: entry.collection, id, document: encoded.value });
    }
    for (const write of staged) {
      this.bucket(write.collection).set(write.id, write.document);
    }
    return ok(staged.map((write) => write.id));
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<Result<Entities[C]>> {
    if (this.unavailable) return this.outage();
    const stored = this.bucket(collection).get(id);
    if (!stored) {
      return fail('NotFound', `${collection}/${id} not found`);
    }
    const decoded = decodeDocument(collection, stored);
    return decoded.ok ? ok(decoded.value) : fail('Invalid', `Stored ${collection}/${id} is malformed`, decoded.issues);
  }

  async updateIfMatch<C extends CollectionName>(
    collection: C,
    id: string,
    expectedVersion: number,
    patch: Partial<Omit<Entities[C], 'id' | 'version'>>
  ): Promise<Result<Entities[C]>> {
    if (this.unavailable) return this.outage();
    const bucket = this.bucket(collection);
    const stored = bucket.get(id);
    if (!stored) {
      return fail('NotFound', `${collection}/${id} not found`);
    }
    const current = decodeDocument(collection, stored);
    if (!current.ok) {
      return fail('Invalid', `Stored ${collection}/${id} is malformed`, current.issues);
    }
    if (current.value.version !== expectedVersion) {
      return fail('Conflict', `${collection}/${id} was modified concurrently`, {
        expectedVersion,
        actualVersion: current.value.version
      });
    }

    const next: Entities[C] = { ...current.value, ...patch, id, version: expectedVersion + 1 };
    const encoded = encodeDocument(collection, next);
    if (!encoded.ok) {
      return fail('Invalid', `Invalid ${collection} document`, encoded.issues);
    }
    bucket.set(id, encoded.value);
    return ok(next);
  }

  async queryByField<C extends CollectionName, F extends keyof Entities[C]>(
    collection: C,
    field: F,
    value: Entities[C][F],
    options: QueryOptions = {}
  ): Promise<Result<Entities[C][]>> {
    if (this.unavailable) return this.outage();
    const matches = this.decodeAll(collection).filter((entity) => entity[field] === value);
    return ok(options.limit === undefined ? matches : matches.slice(0, options.limit));
  }

  async list<C extends CollectionName>(collection: C, options: QueryOptions = {}): Promise<Result<Entities[C][]>> {
    if (this.unavailable) return this.outage();
    const all = this.decodeAll(collection);
    return ok(options.limit === undefined ? all : all.slice(0, options.limit));
  }

  private decodeAll<C extends CollectionName>(collection: C): Entities[C][] {
    const items: Entities[C][] = [];
    const ordered = [...this.bucket(collection)].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [id, stored] of ordered) {
      const decoded = decodeDocument(collection, stored);
      if (decoded.ok) {
        items.push(decoded.value);
      } else {
        console.warn(`[gateway] skipping malformed ${collection}/${id}`, decoded.issues);
      }
    }
    return items;
  }

  private bucket(collection: CollectionName): Map<string, StoredDocument> {
    let bucket = this.collections.get(collection);
    if (!bucket) {
      bucket = new Map();
      this.collections.set(collection, bucket);
    }
    return bucket;
  }

  private outage<T>(): Result<T> {
    return fail('Unavailable', 'Document store is unavailable');
  }
}
