import type { Result } from '../domain/errors';
import type { CollectionName, Entities } from '../domain/types';

export type QueryOptions = {
  /** Caps the result at one page of this size. Without it every match is returned. */
  limit?: number;
};

/** Largest number of documents a listing endpoint answers with. */
export const DEFAULT_QUERY_LIMIT = 500;

/** Documents fetched per store round trip when reading everything. */
export const QUERY_PAGE_SIZE = 500;

/** One document of an atomic multi-document insert. */
export type CreateEntry = { [C in CollectionName]: { collection: C; entity: Entities[C] } }[CollectionName];

/**
 * The only seam that knows about storage. Every method reports store
 * failures as domain errors; none of them throws for NotFound, Conflict,
 * AlreadyExists, Invalid or Unavailable.
 */
export interface PersistenceGateway {
  /** Inserts under `entity.id`; AlreadyExists if that id is taken. */
  create<C extends CollectionName>(collection: C, entity: Entities[C]): Promise<Result<string>>;

  /** Inserts every entry or none of them; AlreadyExists if any id is taken. */
  createAll(entries: readonly CreateEntry[]): Promise<Result<string[]>>;

  get<C extends CollectionName>(collection: C, id: string): Promise<Result<Entities[C]>>;

  /**
   * Applies `patch` only while the stored version equals `expectedVersion`,
   * writing `expectedVersion + 1`. A stale version yields Conflict.
   */
  updateIfMatch<C extends CollectionName>(
    collection: C,
    id: string,
    expectedVersion: number,
    patch: Partial<Omit<Entities[C], 'id' | 'version'>>
  ): Promise<Result<Entities[C]>>;

  /** Results come back ordered by document id. */
  queryByField<C extends CollectionName, F extends keyof Entities[C]>(
    collection: C,
    field: F,
    value: Entities[C][F],
    options?: QueryOptions
  ): Promise<Result<Entities[C][]>>;

  list<C extends CollectionName>(collection: C, options?: QueryOptions): Promise<Result<Entities[C][]>>;
}
