import { stat } from 'fs/promises';
import { basename, extname } from 'path';
import { guessTypeOrDefault } from '../lib/mime.js';

export interface FileMetadata {
  /** File name including extension */
  name: string;

  /** File size in bytes */
  size: number;

  /** Sniffed MIME type, application/octet-stream when unknown */
  mimeType: string;

  /** Absolute file path */
  path: string;

  /** Lowercase extension with leading dot, '' when the name has none */
  extension: string;

  /** Last modification timestamp */
  modifiedAt: Date;
}

export function createFileMetadata(path: string, size: number, modifiedAt: Date = new Date()): FileMetadata {
  const name = basename(path);
  return {
    name,
    size,
    mimeType: guessTypeOrDefault(path),
    path,
    extension: extname(name).toLowerCase(),
    modifiedAt,
  };
}

/** Read metadata for a file that exists on disk. */
export async function readFileMetadata(path: string): Promise<FileMetadata> {
  const stats = await stat(path);
  return createFileMetadata(path, stats.size, stats.mtime);
}
