export type {
  StateStore,
  StoreChange,
  StoreListener,
  UpdateOptions,
  ListOptions,
  RecordStatus,
} from './types.js';
export { FileStateStore, type FileStateStoreOptions } from './file-state-store.js';
export { InMemoryStateStore } from './memory-state-store.js';
export { getDataRoot, setDataRoot, getStoreDir, getBusDir, getBusLogPath } from './paths.js';
