/**
 * Storage layer interfaces.
 *
 * Account records are append-only: a store can add a record and read the
 * full history back, but never rewrites earlier records.
 */

import { AccountRecord } from '../domain/account';

export interface AccountRecordStore {
  /** Append one record. Throws StorageError when the backend cannot be written. */
  append(record: AccountRecord): Promise<void>;
  /** All records in append order. */
  list(): Promise<AccountRecord[]>;
}
