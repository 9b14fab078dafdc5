/**
 * Result store interface.
 * Append-only: a record is written once and never rewritten, so several
 * engine instances can share one store.
 */

import type { IRecord } from '../types/index.js';

export interface IResultStore {
  /**
   * Persist one record as a single complete entry. Rejects on I/O failure.
   */
  append(record: IRecord): Promise<void>;

  /**
   * Every record currently in the store, oldest first
   */
  list(): Promise<IRecord[]>;
}
