/**
 * Optimistic read-compute-write over a DocumentStore.
 *
 * A writer reads `(document, version)`, computes the next document and
 * commits it with a compare-and-swap against the version it read. When
 * another writer got there first the whole cycle is repeated on the fresh
 * document, so no update is silently lost.
 */

import { VersionConflictError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type {
  DocumentCodec,
  DocumentRead,
  DocumentStore,
  Mutation,
  VersionedDocument,
} from './types.js';

export interface UpdateOptions {
  /** Retries after the first attempt before giving up (default: 8). */
  maxRetries?: number;
  /** Base backoff between attempts in ms, multiplied by the attempt number (default: 10). */
  backoffMs?: number;
  logger?: Logger;
}

const DEFAULT_MAX_RETRIES = 8;
const DEFAULT_BACKOFF_MS = 10;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Read a document and validate it against its codec.
 *
 * Corruption is reported, not thrown; a warning is logged so unattended
 * agents leave a trace of what they recovered from.
 */
export async function readDocument<T extends VersionedDocument>(
  store: DocumentStore,
  id: string,
  codec: DocumentCodec<T>,
  logger: Logger = silentLogger,
): Promise<DocumentRead<T>> {
  const stored = await store.get(id);
  if (!stored) return { status: 'missing', version: 0 };

  if (stored.state === 'corrupt') {
    logger.warn(`Corrupt ${codec.kind} document "${id}": ${stored.reason}`);
    return { status: 'corrupt', version: 0, reason: stored.reason };
  }

  const parsed = codec.schema.safeParse(stored.data);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '/'}: ${issue.message}`)
      .join('; ');
    logger.warn(`Corrupt ${codec.kind} document "${id}" (v${stored.version}): ${reason}`);
    return { status: 'corrupt', version: stored.version, reason };
  }

  return { status: 'ok', version: stored.version, document: parsed.data };
}

/**
 * Run `mutate` against the current document until its write commits.
 *
 * `mutate` must be a pure function of the read it is given: it may be
 * called several times. Returning `{ result }` without `write` ends the
 * loop without touching storage.
 *
 * @throws {VersionConflictError} When every attempt lost the race
 */
export async function updateDocument<T extends VersionedDocument, R>(
  store: DocumentStore,
  id: string,
  codec: DocumentCodec<T>,
  mutate: (current: DocumentRead<T>) => Mutation<T, R>,
  options: UpdateOptions = {},
): Promise<R> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  const logger = options.logger ?? silentLogger;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    const current = await readDocument(store, id, codec, logger);
    const mutation = mutate(current);
    if (!('write' in mutation)) return mutation.result;

    const next = { ...mutation.write, version: current.version + 1 };
    if (await store.compareAndSwap(id, current.version, next)) {
      return mutation.result;
    }

    logger.debug(
      `Version conflict on ${codec.kind} "${id}" at v${current.version} (attempt ${attempt}/${maxRetries + 1})`,
    );
    if (attempt <= maxRetries && backoffMs > 0) {
      await delay(backoffMs * attempt);
    }
  }

  logger.warn(`Giving up on ${codec.kind} "${id}" after ${maxRetries + 1} conflicting attempts`);
  throw new VersionConflictError(
    `Document ${codec.kind} "${id}" kept changing; ${maxRetries + 1} attempts lost the race`,
    id,
    maxRetries + 1,
  );
}
