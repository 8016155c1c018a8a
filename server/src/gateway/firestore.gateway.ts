import { FieldPath, type Firestore, type Query, type QuerySnapshot } from 'firebase-admin/firestore';

import { fail, ok, type DomainError, type Result } from '../domain/errors';
import type { CollectionName, Entities } from '../domain/types';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { decodeDocument, encodeDocument, storedField } from './codec';
import { QUERY_PAGE_SIZE, type CreateEntry, type PersistenceGateway, type QueryOptions } from './types';

export type FirestoreGatewayOptions = {
  /** Upper bound for every store call. */
  timeoutMs: number;
  /** Documents per round trip when a query reads everything. */
  pageSize?: number;
};

// gRPC status codes surfaced by the Firestore client.
const GRPC_NOT_FOUND = 5;
const GRPC_ALREADY_EXISTS = 6;
const GRPC_ABORTED = 10;
const GRPC_TRANSIENT = new Set([4, 8, 14]);

function grpcCode(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

export function mapStoreError(error: unknown): DomainError | null {
  if (error instanceof TimeoutError) {
    return { kind: 'Unavailable', message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  const code = grpcCode(error);
  if (code === GRPC_NOT_FOUND) return { kind: 'NotFound', message };
  if (code === GRPC_ALREADY_EXISTS) return { kind: 'AlreadyExists', message };
  if (code === GRPC_ABORTED) return { kind: 'Conflict', message };
  if (code !== null && GRPC_TRANSIENT.has(code)) return { kind: 'Unavailable', message };
  return null;
}

export class FirestoreGateway implements PersistenceGateway {
  constructor(
    private readonly db: Firestore,
    private readonly options: FirestoreGatewayOptions
  ) {}

  async create<C extends CollectionName>(collection: C, entity: Entities[C]): Promise<Result<string>> {
    const encoded = encodeDocument(collection, entity);
    if (!encoded.ok) {
      return fail('Invalid', `Invalid ${collection} document`, encoded.issues);
    }
    return this.run(`${collection} create`, async () => {
      // create() fails with ALREADY_EXISTS instead of overwriting.
      await this.db.collection(collection).doc(entity.id).create(encoded.value);
      return ok(entity.id);
    });
  }

  async createAll(entries: readonly CreateEntry[]): Promise<Result<string[]>> {
    const batch = this.db.batch();
    for (const entry of entries) {
      const encoded = encodeDocument(entry.collection, entry.entity);
      if (!encoded.ok) {
        return fail('Invalid', `Invalid ${entry.collection} document`, encoded.issues);
      }
      batch.create(this.db.collection(entry.collection).doc(entry.entity.id), encoded.value);
    }
    return this.run('batch create', async () => {
      // The whole batch fails with ALREADY_EXISTS if any document is there.
      await batch.commit();
      return ok(entries.map((entry) => entry.entity.id));
    });
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<Result<Entities[C]>> {
    return this.run(`${collection} get`, async () => {
      const snapshot = await this.db.collection(collection).doc(id).get();
      if (!snapshot.exists) {
        return fail('NotFound', `${collection}/${id} not found`);
      }
      const decoded = decodeDocument(collection, snapshot.data());
      return decoded.ok
        ? ok(decoded.value)
        : fail('Invalid', `Stored ${collection}/${id} is malformed`, decoded.issues);
    });
  }

  async updateIfMatch<C extends CollectionName>(
    collection: C,
    id: string,
    expectedVersion: number,
    patch: Partial<Omit<Entities[C], 'id' | 'version'>>
  ): Promise<Result<Entities[C]>> {
    const ref = this.db.collection(collection).doc(id);
    return this.run(`${collection} updateIfMatch`, () =>
      this.db.runTransaction(async (tx): Promise<Result<Entities[C]>> => {
        const snapshot = await tx.get(ref);
        if (!snapshot.exists) {
          return fail('NotFound', `${collection}/${id} not found`);
        }
        const current = decodeDocument(collection, snapshot.data());
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
        tx.set(ref, encoded.value);
        return ok(next);
      })
    );
  }

  async queryByField<C extends CollectionName, F extends keyof Entities[C]>(
    collection: C,
    field: F,
    value: Entities[C][F],
    options: QueryOptions = {}
  ): Promise<Result<Entities[C][]>> {
    const query = this.db.collection(collection).where(storedField(collection, field), '==', value);
    return this.fetch(collection, `${collection} query`, query, options.limit);
  }

  async list<C extends CollectionName>(collection: C, options: QueryOptions = {}): Promise<Result<Entities[C][]>> {
    return this.fetch(collection, `${collection} list`, this.db.collection(collection), options.limit);
  }

  /**
   * Reads `query` in document-id order: one page of `limit` documents when a
   * limit is given, otherwise page after page until the store runs out.
   */
  private async fetch<C extends CollectionName>(
    collection: C,
    label: string,
    query: Query,
    limit: number | undefined
  ): Promise<Result<Entities[C][]>> {
    const pageSize = limit ?? this.options.pageSize ?? QUERY_PAGE_SIZE;
    const items: Entities[C][] = [];
    let cursor: string | null = null;

    for (;;) {
      const after: string | null = cursor;
      const page: Result<QuerySnapshot> = await this.run(label, async () => {
        let ordered = query.orderBy(FieldPath.documentId());
        if (after !== null) ordered = ordered.startAfter(after);
        return ok(await ordered.limit(pageSize).get());
      });
      if (!page.ok) return page;

      items.push(...this.decodeAll(collection, page.value));
      const last = page.value.docs.at(-1);
      if (limit !== undefined || page.value.size < pageSize || !last) {
        return ok(items);
      }
      cursor = last.id;
    }
  }

  private decodeAll<C extends CollectionName>(collection: C, snapshots: QuerySnapshot): Entities[C][] {
    const items: Entities[C][] = [];
    for (const doc of snapshots.docs) {
      const decoded = decodeDocument(collection, doc.data());
      if (decoded.ok) {
        items.push(decoded.value);
      } else {
        console.warn(`[gateway] skipping malformed ${collection}/${doc.id}`, decoded.issues);
      }
    }
    return items;
  }

  private async run<T>(label: string, task: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
      return await withTimeout(this.options.timeoutMs, label, task);
    } catch (error) {
      const mapped = mapStoreError(error);
      if (!mapped) {
        throw error;
      }
      console.warn(`[gateway] ${label} failed: ${mapped.kind}`, mapped.message);
      return { ok: false, error: mapped };
    }
  }
}
