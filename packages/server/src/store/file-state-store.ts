import { link, readdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { nanoid } from 'nanoid';
import type { CollectionName, CollectionRecords } from '@relief-pipeline/shared';
import { getConfig } from '../config/index.js';
import {
  hasErrorCode,
  NotFoundError,
  StoreConflictError,
  StoreError,
} from '../pipeline/errors.js';
import { createLogger } from '../utils/logger.js';
import { ensureDir, getStoreDir } from './paths.js';
import { applyPatch, ChangeNotifier, parseRecord } from './records.js';
import type { ListOptions, StateStore, StoreListener, UpdateOptions } from './types.js';

const log = createLogger('file-state-store');

export interface FileStateStoreOptions {
  /** Directory holding one sub-directory per collection */
  rootDir?: string;
  /** A lock file older than this is considered abandoned */
  lockStaleMs?: number;
  /** How long an update waits for a lock before failing */
  lockTimeoutMs?: number;
}

interface LockFile {
  token: string;
  pid: number;
  acquiredAt: string;
}

async function removeIfExists(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) {
      throw error;
    }
  }
}

/**
 * State store keeping each record as a JSON file:
 * `{rootDir}/{collection}/{encoded id}.json`.
 *
 * - Conditional create writes a temp file and hard-links it into place, so the
 *   create fails with EEXIST when the id is taken and readers never observe a
 *   partially written document.
 * - Field updates serialize on a per-document lock file (exclusive create,
 *   broken after `lockStaleMs`) and replace the document via temp file + rename.
 *
 * Several processes may share one root directory. Change subscriptions only
 * see writes made through this instance.
 */
export class FileStateStore implements StateStore {
  private readonly rootDir: string;
  private readonly lockStaleMs: number;
  private readonly lockTimeoutMs: number;
  private readonly notifier = new ChangeNotifier();

  constructor(options: FileStateStoreOptions = {}) {
    this.rootDir = options.rootDir ?? getStoreDir();
    this.lockStaleMs = options.lockStaleMs ?? getConfig().lockStaleMs;
    this.lockTimeoutMs = options.lockTimeoutMs ?? this.lockStaleMs * 2;
  }

  async create<C extends CollectionName>(
    collection: C,
    id: string,
    record: CollectionRecords[C]
  ): Promise<CollectionRecords[C]> {
    const validated = parseRecord(collection, id, record);
    const path = this.documentPath(collection, id);
    await ensureDir(dirname(path));

    const tmpPath = `${path}.${nanoid(8)}.tmp`;
    await writeFile(tmpPath, JSON.stringify(validated, null, 2), 'utf-8');
    try {
      await link(tmpPath, path);
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new StoreConflictError(collection, id);
      }
      throw new StoreError(`Failed to create ${collection}/${id}`, { collection, id }, error);
    } finally {
      await removeIfExists(tmpPath);
    }

    log.debug({ collection, id }, 'Document created');
    this.notifier.notify({ collection, id, change: 'created', record: validated, previous: null });
    return validated;
  }

  async read<C extends CollectionName>(
    collection: C,
    id: string
  ): Promise<CollectionRecords[C] | null> {
    const path = this.documentPath(collection, id);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw new StoreError(`Failed to read ${collection}/${id}`, { collection, id }, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StoreError(`Corrupted document ${collection}/${id}`, { collection, id }, error);
    }
    return parseRecord(collection, id, raw);
  }

  async update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>,
    options: UpdateOptions<C> = {}
  ): Promise<CollectionRecords[C]> {
    const path = this.documentPath(collection, id);
    const release = await this.acquireLock(path);
    try {
      const current = await this.read(collection, id);
      if (!current) {
        throw new NotFoundError(collection, id);
      }

      const next = applyPatch(collection, id, current, patch, options);
      await this.writeAtomic(path, next);

      log.debug({ collection, id, fields: Object.keys(patch) }, 'Document updated');
      this.notifier.notify({ collection, id, change: 'updated', record: next, previous: current });
      return next;
    } finally {
      await release();
    }
  }

  async list<C extends CollectionName>(
    collection: C,
    options: ListOptions<C> = {}
  ): Promise<CollectionRecords[C][]> {
    const dir = join(this.rootDir, collection);

    let files: string[];
    try {
      files = await readdir(dir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw new StoreError(`Failed to list ${collection}`, { collection }, error);
    }

    const records: CollectionRecords[C][] = [];
    for (const file of files.filter((f) => f.endsWith('.json')).sort()) {
      const id = decodeURIComponent(file.slice(0, -'.json'.length));
      const record = await this.read(collection, id);
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

  private documentPath(collection: CollectionName, id: string): string {
    return join(this.rootDir, collection, `${encodeURIComponent(id)}.json`);
  }

  private async writeAtomic(path: string, record: unknown): Promise<void> {
    const tmpPath = `${path}.${nanoid(8)}.tmp`;
    try {
      await writeFile(tmpPath, JSON.stringify(record, null, 2), 'utf-8');
      await rename(tmpPath, path);
    } catch (error) {
      await removeIfExists(tmpPath);
      throw new StoreError(`Failed to write ${path}`, { path }, error);
    }
  }

  /**
   * Take the per-document lock. Resolves to the release function.
   */
  private async acquireLock(path: string): Promise<() => Promise<void>> {
    const lockPath = `${path}.lock`;
    const token = nanoid();
    const deadline = Date.now() + this.lockTimeoutMs;
    const lock: LockFile = { token, pid: process.pid, acquiredAt: new Date().toISOString() };

    for (;;) {
      try {
        await writeFile(lockPath, JSON.stringify(lock), { encoding: 'utf-8', flag: 'wx' });
        return () => this.releaseLock(lockPath, token);
      } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
          await ensureDir(dirname(lockPath));
          continue;
        }
        if (!hasErrorCode(error, 'EEXIST')) {
          throw new StoreError(`Failed to lock ${path}`, { path }, error);
        }
      }

      await this.breakStaleLock(lockPath);
      if (Date.now() > deadline) {
        throw new StoreError(`Timed out waiting for lock on ${path}`, {
          path,
          lockTimeoutMs: this.lockTimeoutMs,
        });
      }
      await delay(5 + Math.floor(Math.random() * 20));
    }
  }

  private async releaseLock(lockPath: string, token: string): Promise<void> {
    let content: string;
    try {
      content = await readFile(lockPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        log.warn({ lockPath }, 'Lock vanished before release');
        return;
      }
      throw error;
    }

    // Only remove the lock if it is still ours; a stale-lock breaker may have replaced it
    if (content.includes(token)) {
      await removeIfExists(lockPath);
    } else {
      log.warn({ lockPath }, 'Lock was taken over before release');
    }
  }

  private async breakStaleLock(lockPath: string): Promise<void> {
    try {
      const info = await stat(lockPath);
      if (Date.now() - info.mtimeMs > this.lockStaleMs) {
        log.warn({ lockPath, ageMs: Date.now() - info.mtimeMs }, 'Breaking stale lock');
        await removeIfExists(lockPath);
      }
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }
}
