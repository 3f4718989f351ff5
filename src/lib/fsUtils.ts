import { cp, open, readdir, rename, rm, stat } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { Dirent } from 'fs';
import { extname, join } from 'path';
import { CollisionPolicy } from '../types/index.js';
import { errnoCode, toError } from './errors.js';
import { FINGERPRINT_CHUNK_SIZE } from './checksum.js';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Move a file or directory. Falls back to copy + remove when the
 * destination is on another device (rename gives EXDEV).
 */
export async function moveEntry(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') {
      throw error;
    }
    await cp(source, destination, { recursive: true, force: true, preserveTimestamps: true });
    await rm(source, { recursive: true, force: true });
  }
}

/**
 * Pick the destination path for `fileName` inside `directory`.
 * @returns the path to write to, or null when the policy says to leave the file alone
 */
export async function resolveDestination(
  directory: string,
  fileName: string,
  policy: CollisionPolicy
): Promise<string | null> {
  const candidate = join(directory, fileName);

  if (policy === CollisionPolicy.OVERWRITE || !(await pathExists(candidate))) {
    return candidate;
  }

  if (policy === CollisionPolicy.SKIP) {
    return null;
  }

  // "report.pdf" -> "report (1).pdf", "report (2).pdf", ...
  const extension = extname(fileName);
  const stem = fileName.slice(0, fileName.length - extension.length);

  for (let suffix = 1; ; suffix++) {
    const renamed = join(directory, `${stem} (${suffix})${extension}`);
    if (!(await pathExists(renamed))) {
      return renamed;
    }
  }
}

/**
 * Byte-for-byte comparison of two files, read in fixed-size chunks.
 */
export async function filesHaveSameContent(first: string, second: string): Promise<boolean> {
  const [firstStats, secondStats] = await Promise.all([stat(first), stat(second)]);
  if (firstStats.size !== secondStats.size) {
    return false;
  }

  let firstHandle: FileHandle | null = null;
  let secondHandle: FileHandle | null = null;

  try {
    firstHandle = await open(first, 'r');
    secondHandle = await open(second, 'r');

    const firstBuffer = Buffer.alloc(FINGERPRINT_CHUNK_SIZE);
    const secondBuffer = Buffer.alloc(FINGERPRINT_CHUNK_SIZE);

    for (;;) {
      const [a, b] = await Promise.all([
        firstHandle.read(firstBuffer, 0, FINGERPRINT_CHUNK_SIZE, null),
        secondHandle.read(secondBuffer, 0, FINGERPRINT_CHUNK_SIZE, null),
      ]);

      if (a.bytesRead !== b.bytesRead) {
        return false;
      }
      if (a.bytesRead === 0) {
        return true;
      }
      if (!firstBuffer.subarray(0, a.bytesRead).equals(secondBuffer.subarray(0, b.bytesRead))) {
        return false;
      }
    }
  } finally {
    await closeHandles([firstHandle, secondHandle]);
  }
}

/**
 * Close every open handle, then raise the first close failure.
 */
export async function closeHandles(handles: ReadonlyArray<FileHandle | null>): Promise<void> {
  const results = await Promise.allSettled(handles.map((handle) => handle?.close()));
  for (const result of results) {
    if (result.status === 'rejected') {
      throw toError(result.reason);
    }
  }
}

/**
 * Depth-first walk yielding regular files. Entries of one directory are
 * visited in name order; symlinks and special files are skipped.
 */
export async function* walkFiles(
  directory: string,
  onError: (path: string, error: Error) => void
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    onError(directory, toError(error));
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(entryPath, onError);
    } else if (entry.isFile()) {
      yield entryPath;
    }
  }
}
