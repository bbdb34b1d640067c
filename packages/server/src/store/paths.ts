import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';
import { getConfig } from '../config/index.js';

let dataRoot: string | null = null;

export function getDataRoot(): string {
  if (dataRoot) {
    return dataRoot;
  }

  dataRoot = getConfig().dataDir;
  return dataRoot;
}

export function setDataRoot(root: string | null): void {
  dataRoot = root;
}

export function getStoreDir(): string {
  return join(getDataRoot(), 'store');
}

export function getBusDir(): string {
  return join(getDataRoot(), 'bus');
}

export function getBusLogPath(): string {
  return join(getBusDir(), 'wal.jsonl');
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
