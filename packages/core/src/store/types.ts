import type { z } from 'zod';

/** Every stored document carries a monotonically increasing version. */
export interface VersionedDocument {
  version: number;
}

/**
 * What a store hands back for an id.
 *
 * A corrupt entry (unparsable JSON, or no numeric `version`) reports
 * version 0 so that a writer can replace it with a compare-and-swap
 * against 0, the same as for a missing entry.
 */
export type StoredDocument =
  | { state: 'present'; version: number; data: unknown }
  | { state: 'corrupt'; version: 0; reason: string };

/**
 * Storage port for shared mutable documents.
 *
 * Implementations must make `compareAndSwap` atomic with respect to other
 * writers of the same id: it succeeds only if the stored version still
 * equals `expectedVersion` (0 = absent or corrupt).
 */
export interface DocumentStore {
  /** Read the current document and its version, or null if absent. */
  get(id: string): Promise<StoredDocument | null>;
  /** Replace the document if its version is still `expectedVersion`. */
  compareAndSwap(id: string, expectedVersion: number, document: VersionedDocument): Promise<boolean>;
  /** Ids of all stored documents. */
  list(): Promise<string[]>;
}

/** Schema and defaults for one kind of document. */
export interface DocumentCodec<T extends VersionedDocument> {
  /** Human-readable kind, used in log lines and errors (e.g. `session`). */
  kind: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/** Typed view of a read, after schema validation. */
export type DocumentRead<T extends VersionedDocument> =
  | { status: 'missing'; version: 0 }
  | { status: 'corrupt'; version: number; reason: string }
  | { status: 'ok'; version: number; document: T };

/** A mutation either writes a new document or only produces a result. */
export type Mutation<T extends VersionedDocument, R> =
  | { write: Omit<T, 'version'>; result: R }
  | { result: R };
