export type {
  VersionedDocument,
  StoredDocument,
  DocumentStore,
  DocumentCodec,
  DocumentRead,
  Mutation,
} from './types.js';
export { FileDocumentStore } from './file-store.js';
export type { FileDocumentStoreOptions } from './file-store.js';
export { InMemoryDocumentStore } from './memory-store.js';
export { parseStoredContent } from './parse.js';
export { readDocument, updateDocument } from './update.js';
export type { UpdateOptions } from './update.js';
