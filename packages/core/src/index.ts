/**
 * @colloquy/core — foundation shared by every Colloquy package.
 *
 * Provides the versioned document store port and its file/in-memory
 * adapters, the optimistic update loop, error and failure types,
 * logging, configuration and workspace paths.
 */

// ── Configuration ───────────────────────────────────────────────────
export { ColloquyConfigSchema, defaultConfig, parseConfig, loadConfig } from './config/index.js';
export type { ColloquyConfig, ColloquyConfigInput } from './config/index.js';

// ── Document Storage ────────────────────────────────────────────────
export {
  FileDocumentStore,
  InMemoryDocumentStore,
  parseStoredContent,
  readDocument,
  updateDocument,
} from './store/index.js';
export type {
  VersionedDocument,
  StoredDocument,
  DocumentStore,
  DocumentCodec,
  DocumentRead,
  Mutation,
  FileDocumentStoreOptions,
  UpdateOptions,
} from './store/index.js';

// ── Errors & Failures ───────────────────────────────────────────────
export {
  ValidationError,
  FileSystemError,
  LockTimeoutError,
  VersionConflictError,
} from './errors.js';
export { ErrorKind, failure, isFailure, failureFromError } from './result.js';
export type { Failure } from './result.js';

// ── Logging ─────────────────────────────────────────────────────────
export { createLogger, silentLogger, LogLevel } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// ── Utility Functions ───────────────────────────────────────────────
export { withFileLock } from './utils/file-lock.js';
export type { LockOptions } from './utils/file-lock.js';
export { atomicWrite } from './utils/atomic-write.js';
export { createValidator, compileSchema, collectSchemaIssues } from './utils/validator.js';
export type { SchemaIssue } from './utils/validator.js';
export { isReservedKey, hasOwnKey, ownValue, isJsonSerializable } from './utils/records.js';
export {
  getColloquyRoot,
  getSessionsDir,
  getDiscoveryDir,
  getEventsDir,
  getEventLogPath,
  getConfigPath,
} from './utils/paths.js';

// ── Workspace Initialization ────────────────────────────────────────
export { initWorkspace } from './init.js';
export type { InitOptions } from './init.js';
