import type { CollectionName, CollectionRecords } from '@relief-pipeline/shared';

/**
 * Status field of a collection's records, `never` for collections without one
 */
export type RecordStatus<C extends CollectionName> = CollectionRecords[C] extends { status: infer S }
  ? S
  : never;

export interface StoreChange<C extends CollectionName = CollectionName> {
  collection: C;
  id: string;
  change: 'created' | 'updated';
  record: CollectionRecords[C];
  previous: CollectionRecords[C] | null;
}

export type StoreListener = (change: StoreChange) => void;

export interface UpdateOptions<C extends CollectionName> {
  /** Compare-and-set: the update is applied only while the record has this status */
  expectStatus?: RecordStatus<C>;
  /** Optional fields to remove from the record */
  unset?: ReadonlyArray<keyof CollectionRecords[C] & string>;
}

export interface ListOptions<C extends CollectionName> {
  filter?: (record: CollectionRecords[C]) => boolean;
}

/**
 * Durable document store shared by every stage.
 *
 * `create` is a conditional create: it fails with StoreConflictError when the
 * id is taken, and at most one of any number of concurrent callers succeeds.
 * Every record read back is validated against its collection schema.
 */
export interface StateStore {
  create<C extends CollectionName>(
    collection: C,
    id: string,
    record: CollectionRecords[C]
  ): Promise<CollectionRecords[C]>;

  read<C extends CollectionName>(collection: C, id: string): Promise<CollectionRecords[C] | null>;

  /**
   * Merge `patch` into an existing record. Throws NotFoundError when the record
   * is absent and StoreConflictError when `expectStatus` does not match.
   */
  update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>,
    options?: UpdateOptions<C>
  ): Promise<CollectionRecords[C]>;

  list<C extends CollectionName>(
    collection: C,
    options?: ListOptions<C>
  ): Promise<CollectionRecords[C][]>;

  /**
   * Listen for created/updated records. Returns the unsubscribe function.
   */
  subscribe(collection: CollectionName | '*', listener: StoreListener): () => void;

  close(): Promise<void>;
}
