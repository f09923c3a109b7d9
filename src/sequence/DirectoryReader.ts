/**
 * Directory Reader
 *
 * The matcher's only contact with the filesystem: a non-recursive listing of
 * the file entries present in a directory at call time. Tests and hosts with
 * their own storage provide alternative readers.
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import { AppError, NotFoundError, PermissionError } from '../core/errors';

export interface DirectoryReader {
  /**
   * Names of the non-directory entries in `directoryPath`.
   * Throws NotFoundError / PermissionError for missing or unreadable paths.
   */
  listFiles(directoryPath: string): Iterable<string>;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Translate a Node.js filesystem error into the library's error taxonomy.
 */
export function toDirectoryError(directoryPath: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  switch (errorCode(err)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new NotFoundError(directoryPath, { cause: err });
    case 'EACCES':
    case 'EPERM':
      return new PermissionError(directoryPath, { cause: err });
    default: {
      const detail = err instanceof Error ? err.message : String(err);
      return new AppError(`Failed to read directory ${directoryPath}: ${detail}`, 'FILESYSTEM_ERROR', {
        cause: err,
      });
    }
  }
}

/** Directories, and symlinks that resolve to one, are not frames. */
function isDirectoryEntry(directoryPath: string, entry: Dirent): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  return statSync(join(directoryPath, entry.name), { throwIfNoEntry: false })?.isDirectory() === true;
}

export const nodeDirectoryReader: DirectoryReader = {
  listFiles(directoryPath: string): string[] {
    try {
      return readdirSync(directoryPath, { withFileTypes: true })
        .filter(entry => !isDirectoryEntry(directoryPath, entry))
        .map(entry => entry.name);
    } catch (err) {
      throw toDirectoryError(directoryPath, err);
    }
  },
};
