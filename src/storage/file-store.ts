/**
 * File-backed account record store.
 *
 * Each record is appended as a text block followed by a newline. The file
 * and its parent directory are created on first append; existing content
 * is never rewritten.
 */

import { appendFile, mkdir, readFile } from 'fs/promises';
import path from 'path';
import { AccountRecord, parseTextBlocks, toTextBlock } from '../domain/account';
import { StorageError, fileAppendError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { AccountRecordStore } from './store';

export interface FileAccountRecordStore extends AccountRecordStore {
  readonly filePath: string;
}

/** fs errors may come from another realm, so match on shape rather than class. */
export function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export function createFileAccountStore(filePath: string, log: Logger = rootLogger): FileAccountRecordStore {
  const storeLog = log.child({ module: 'file-store', filePath });

  return {
    filePath,

    async append(record: AccountRecord): Promise<void> {
      try {
        await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
        await appendFile(filePath, `${toTextBlock(record)}\n`, { encoding: 'utf8' });
      } catch (err) {
        storeLog.error('Failed to append account record', { recordId: record.id, error: String(err) });
        throw new StorageError(fileAppendError(filePath, err));
      }
      storeLog.info('Appended account record', { recordId: record.id });
    },

    async list(): Promise<AccountRecord[]> {
      try {
        return parseTextBlocks(await readFile(filePath, 'utf8'));
      } catch (err) {
        if (isMissingFile(err)) return [];
        throw err;
      }
    },
  };
}
