import {
  collectionSchemas,
  type CollectionName,
  type CollectionRecords,
} from '@relief-pipeline/shared';
import { StoreConflictError, StoreError } from '../pipeline/errors.js';
import { createLogger } from '../utils/logger.js';
import type { StoreChange, StoreListener, UpdateOptions } from './types.js';

const log = createLogger('store');

/**
 * Validate a raw document against its collection schema.
 */
export function parseRecord<C extends CollectionName>(
  collection: C,
  id: string,
  raw: unknown
): CollectionRecords[C] {
  const result = collectionSchemas[collection].safeParse(raw);
  if (!result.success) {
    throw new StoreError(`Invalid ${collection} document: ${id}`, {
      collection,
      id,
      issues: result.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message })),
    });
  }
  return result.data;
}

export function statusOf(record: object): string | undefined {
  return 'status' in record && typeof record.status === 'string' ? record.status : undefined;
}

/**
 * Compute the next version of a record for a field update.
 */
export function applyPatch<C extends CollectionName>(
  collection: C,
  id: string,
  current: CollectionRecords[C],
  patch: Partial<CollectionRecords[C]>,
  options: UpdateOptions<C> = {}
): CollectionRecords[C] {
  const expected: unknown = options.expectStatus;
  if (expected !== undefined) {
    const actual = statusOf(current);
    if (actual !== expected) {
      throw new StoreConflictError(
        collection,
        id,
        `Expected ${collection}/${id} to be ${String(expected)} but it is ${actual ?? 'unset'}`
      );
    }
  }

  const unset = new Set<string>(options.unset ?? []);
  const merged = Object.fromEntries(
    [...Object.entries(current), ...Object.entries(patch)].filter(([key]) => !unset.has(key))
  );
  return parseRecord(collection, id, merged);
}

/**
 * In-process fan-out of store changes.
 */
export class ChangeNotifier {
  private readonly listeners: Map<CollectionName | '*', Set<StoreListener>> = new Map();

  subscribe(collection: CollectionName | '*', listener: StoreListener): () => void {
    const channel = this.listeners.get(collection) ?? new Set<StoreListener>();
    this.listeners.set(collection, channel);
    channel.add(listener);
    return () => {
      channel.delete(listener);
    };
  }

  notify(change: StoreChange): void {
    const targets = [
      ...(this.listeners.get(change.collection) ?? []),
      ...(this.listeners.get('*') ?? []),
    ];
    for (const listener of targets) {
      try {
        listener(change);
      } catch (err) {
        log.error(
          { err, collection: change.collection, id: change.id },
          'Store change listener threw'
        );
      }
    }
  }

  clear(): void {
    this.listeners.clear();
  }
}
