/**
 * File-backed result store.
 * Each record is one appendFile call, and calls are chained so that two
 * sessions in the same process never interleave their lines.
 */

import fs from 'fs';
import path from 'path';
import type { IResultStore } from './index.js';
import type { IRecord } from '../types/index.js';
import type { ILogger } from '../infra/logger.js';
import { formatRecordLine, parseRecordLine } from './record-format.js';

export class FileResultStore implements IResultStore {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private filePath: string,
    private logger?: ILogger
  ) {}

  append(record: IRecord): Promise<void> {
    const write = async () => {
      const line = formatRecordLine(record);
      await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await fs.promises.appendFile(this.filePath, line, 'utf8');
      this.logger?.info('Record appended', { file: this.filePath, address: record.address });
    };

    const result = this.tail.then(write);
    // The caller sees a failure through `result`; the tail only orders writes
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async list(): Promise<IRecord[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: IRecord[] = [];
    for (const line of content.split('\n')) {
      const record = parseRecordLine(line);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }
}
