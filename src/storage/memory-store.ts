/**
 * In-memory storage implementation.
 *
 * Reference implementation for tests. Records are deep-copied on the way
 * in and out so callers cannot mutate stored state through a reference.
 */

import { AccountRecord } from '../domain/account';
import { AccountRecordStore } from './store';

function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

export interface MemoryAccountRecordStore extends AccountRecordStore {
  /** Number of stored records. */
  readonly size: number;
}

export function createMemoryAccountStore(): MemoryAccountRecordStore {
  const records: AccountRecord[] = [];

  return {
    get size() {
      return records.length;
    },
    async append(record: AccountRecord): Promise<void> {
      records.push(deepCopy(record));
    },
    async list(): Promise<AccountRecord[]> {
      return records.map(deepCopy);
    },
  };
}
