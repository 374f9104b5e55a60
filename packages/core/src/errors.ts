/**
 * Error classes thrown inside the @colloquy/core storage layer.
 *
 * Public coordination operations translate these into structured
 * failures (see `result.ts`); they only escape for programming errors.
 */

/** Thrown when input or stored data does not match its schema. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly details: unknown[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Thrown when a file system read/write operation fails. */
export class FileSystemError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/** Thrown when a file lock cannot be acquired after retries. */
export class LockTimeoutError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'LockTimeoutError';
  }
}

/**
 * Thrown when the compare-and-swap loop gives up because other writers
 * kept replacing the document between our read and our commit.
 */
export class VersionConflictError extends Error {
  constructor(
    message: string,
    public readonly documentId: string,
    public readonly attempts: number,
  ) {
    super(message);
    this.name = 'VersionConflictError';
  }
}
