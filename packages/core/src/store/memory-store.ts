import type { DocumentStore, StoredDocument, VersionedDocument } from './types.js';
import { parseStoredContent } from './parse.js';

/**
 * In-process DocumentStore. Documents are kept serialized so that callers
 * never share object references with the store, matching file semantics.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private entries = new Map<string, string>();

  async get(id: string): Promise<StoredDocument | null> {
    const raw = this.entries.get(id);
    if (raw === undefined) return null;
    return parseStoredContent(raw);
  }

  async compareAndSwap(id: string, expectedVersion: number, document: VersionedDocument): Promise<boolean> {
    const current = await this.get(id);
    const currentVersion = current ? current.version : 0;
    if (currentVersion !== expectedVersion) return false;
    this.entries.set(id, JSON.stringify(document));
    return true;
  }

  async list(): Promise<string[]> {
    return [...this.entries.keys()];
  }

  /** Store raw text under an id, bypassing versioning. Useful to simulate corruption. */
  putRaw(id: string, content: string): void {
    this.entries.set(id, content);
  }

  /** Raw text currently stored under an id. */
  getRaw(id: string): string | undefined {
    return this.entries.get(id);
  }
}
