/**
 * File-backed DocumentStore — one `<id>.json` file per document.
 *
 * Reads are lock-free. The commit of a compare-and-swap (re-read the
 * on-disk version, compare, atomic temp-file + rename) runs under a short
 * proper-lockfile lock so that two processes cannot both pass the version
 * check. No lock is held while callers compute the next document.
 */

import fs from 'graceful-fs';
import path from 'node:path';
import { atomicWrite } from '../utils/atomic-write.js';
import { withFileLock } from '../utils/file-lock.js';
import type { LockOptions } from '../utils/file-lock.js';
import { FileSystemError, ValidationError } from '../errors.js';
import { parseStoredContent } from './parse.js';
import type { DocumentStore, StoredDocument, VersionedDocument } from './types.js';

const fsPromises = fs.promises;

const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface FileDocumentStoreOptions {
  /** Lock tuning for the commit step. */
  lock?: LockOptions;
}

export class FileDocumentStore implements DocumentStore {
  constructor(
    private readonly directory: string,
    private readonly options: FileDocumentStoreOptions = {},
  ) {}

  /** Absolute path of the file backing `id`. */
  pathFor(id: string): string {
    if (!DOCUMENT_ID_PATTERN.test(id)) {
      throw new ValidationError(`Invalid document id "${id}"`, 'document-id', [{ id }]);
    }
    return path.join(this.directory, `${id}.json`);
  }

  async get(id: string): Promise<StoredDocument | null> {
    const filePath = this.pathFor(id);
    let content: string;
    try {
      content = await fsPromises.readFile(filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
      throw new FileSystemError(
        `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        filePath,
        err,
      );
    }
    return parseStoredContent(content);
  }

  async compareAndSwap(id: string, expectedVersion: number, document: VersionedDocument): Promise<boolean> {
    const filePath = this.pathFor(id);
    await fsPromises.mkdir(this.directory, { recursive: true });

    return withFileLock(
      filePath,
      async () => {
        const current = await this.get(id);
        const currentVersion = current ? current.version : 0;
        if (currentVersion !== expectedVersion) return false;
        await atomicWrite(filePath, JSON.stringify(document, null, 2));
        return true;
      },
      this.options.lock,
    );
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fsPromises.readdir(this.directory);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw new FileSystemError(
        `Failed to list ${this.directory}: ${err instanceof Error ? err.message : String(err)}`,
        this.directory,
        err,
      );
    }
    return entries
      .filter((name) => name.endsWith('.json') && !name.startsWith('.'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }
}
