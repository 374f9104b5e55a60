import lockfile from 'proper-lockfile';
import { LockTimeoutError } from '../errors.js';

/**
 * Options for file lock acquisition.
 */
export interface LockOptions {
  /** Number of retry attempts (default: 10) */
  retries?: number;
  /** Minimum timeout between retries in ms (default: 20) */
  minTimeout?: number;
  /** Maximum timeout between retries in ms (default: 500) */
  maxTimeout?: number;
  /** Lock stale threshold in ms (default: 5000) */
  stale?: number;
}

const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  retries: 10,
  minTimeout: 20,
  maxTimeout: 500,
  stale: 5000,
};

/**
 * Executes an operation while holding an exclusive lock on `filePath`.
 *
 * The target file does not need to exist: the lock is a sibling
 * `<file>.lock` directory managed by proper-lockfile.
 *
 * @throws {LockTimeoutError} If the lock cannot be acquired after retries
 */
export async function withFileLock<T>(
  filePath: string,
  operation: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options };
  let release: () => Promise<void>;

  try {
    release = await lockfile.lock(filePath, {
      realpath: false,
      retries: {
        retries: opts.retries,
        minTimeout: opts.minTimeout,
        maxTimeout: opts.maxTimeout,
        randomize: true,
      },
      stale: opts.stale,
    });
  } catch (err) {
    throw new LockTimeoutError(
      `Could not acquire lock on ${filePath} after ${opts.retries} retries: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return await operation();
  } finally {
    await release();
  }
}
