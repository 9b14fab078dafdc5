/**
 * In-memory implementation of IResultStore, for dry runs and tests.
 */

import type { IResultStore } from './index.js';
import type { IRecord } from '../types/index.js';
import { formatRecordLine } from './record-format.js';

export class InMemoryResultStore implements IResultStore {
  private records: IRecord[] = [];

  async append(record: IRecord): Promise<void> {
    // Same validation as the file store, so a dry run rejects what a real run would
    formatRecordLine(record);
    this.records.push(Object.freeze({ ...record }));
  }

  async list(): Promise<IRecord[]> {
    return [...this.records];
  }

  clear(): void {
    this.records = [];
  }
}
