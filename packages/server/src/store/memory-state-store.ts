import type { CollectionName, CollectionRecords } from '@relief-pipeline/shared';
import { NotFoundError, StoreConflictError } from '../pipeline/errors.js';
import { applyPatch, ChangeNotifier, parseRecord } from './records.js';
import type { ListOptions, StateStore, StoreListener, UpdateOptions } from './types.js';

/**
 * Process-local state store. Used by tests and single-process runs.
 */
export class InMemoryStateStore implements StateStore {
  private readonly documents: Map<CollectionName, Map<string, unknown>> = new Map();
  private readonly notifier = new ChangeNotifier();

  async create<C extends CollectionName>(
    collection: C,
    id: string,
    record: CollectionRecords[C]
  ): Promise<CollectionRecords[C]> {
    const validated = parseRecord(collection, id, record);
    const docs = this.collection(collection);
    if (docs.has(id)) {
      throw new StoreConflictError(collection, id);
    }
    docs.set(id, structuredClone(validated));
    this.notifier.notify({ collection, id, change: 'created', record: validated, previous: null });
    return validated;
  }

  async read<C extends CollectionName>(
    collection: C,
    id: string
  ): Promise<CollectionRecords[C] | null> {
    return this.readNow(collection, id);
  }

  async update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>,
    options: UpdateOptions<C> = {}
  ): Promise<CollectionRecords[C]> {
    // Read-modify-write without an await in between keeps updates atomic
    const current = this.readNow(collection, id);
    if (!current) {
      throw new NotFoundError(collection, id);
    }
    const next = applyPatch(collection, id, current, patch, options);
    this.collection(collection).set(id, structuredClone(next));
    this.notifier.notify({ collection, id, change: 'updated', record: next, previous: current });
    return next;
  }

  async list<C extends CollectionName>(
    collection: C,
    options: ListOptions<C> = {}
  ): Promise<CollectionRecords[C][]> {
    const ids = [...this.collection(collection).keys()].sort();
    const records: CollectionRecords[C][] = [];
    for (const id of ids) {
      const record = this.readNow(collection, id);
      if (record && (!options.filter || options.filter(record))) {
        records.push(record);
      }
    }
    return records;
  }

  subscribe(collection: CollectionName | '*', listener: StoreListener): () => void {
    return this.notifier.subscribe(collection, listener);
  }

  async close(): Promise<void> {
    this.notifier.clear();
  }

  private readNow<C extends CollectionName>(collection: C, id: string): CollectionRecords[C] | null {
    const raw = this.collection(collection).get(id);
    return raw === undefined ? null : parseRecord(collection, id, raw);
  }

  private collection(name: CollectionName): Map<string, unknown> {
    let docs = this.documents.get(name);
    if (!docs) {
      docs = new Map();
      this.documents.set(name, docs);
    }
    return docs;
  }
}
