import fs from 'graceful-fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { FileSystemError } from '../errors.js';

const fsPromises = fs.promises;

/**
 * Atomically replaces a file's content using a temporary file + rename.
 * Readers see either the previous content or the new content, never a mix.
 *
 * The temporary name is unique per call so concurrent writers in other
 * processes never clobber each other's staging file.
 *
 * @throws {FileSystemError} If the write or rename operation fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${uuidv4()}.tmp`,
  );
  try {
    await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
    await fsPromises.writeFile(tmpPath, content, 'utf-8');
    await fsPromises.rename(tmpPath, filePath);
  } catch (err) {
    await fsPromises.unlink(tmpPath).catch(() => undefined);
    throw new FileSystemError(
      `Atomic write failed for ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err,
    );
  }
}
