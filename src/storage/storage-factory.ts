/**
 * Factory for creating result stores.
 * Supports the append-only file store and an in-memory store for dry runs.
 */

import type { IResultStore } from './index.js';
import type { ILogger } from '../infra/logger.js';
import { FileResultStore } from './file-result-store.js';
import { InMemoryResultStore } from './in-memory-result-store.js';

export type StoreType = 'file' | 'memory';

export const STORE_TYPES: readonly StoreType[] = ['file', 'memory'];

export function isStoreType(value: string): value is StoreType {
  return STORE_TYPES.some(type => type === value);
}

/**
 * Create a store; unknown types fall back to the file store.
 */
export function createResultStore(type: string, resultsFile: string, logger?: ILogger): IResultStore {
  const normalized = type.trim().toLowerCase();
  const storeType: StoreType = isStoreType(normalized) ? normalized : 'file';

  switch (storeType) {
    case 'memory':
      return new InMemoryResultStore();

    case 'file':
    default:
      return new FileResultStore(resultsFile, logger);
  }
}
