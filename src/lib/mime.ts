import { lookup } from 'mime-types';
import { DEFAULT_MIME_TYPE } from '../types/index.js';

/**
 * Best-effort MIME type from the file name. `null` when unknown.
 */
export function guessType(filePath: string): string | null {
  return lookup(filePath) || null;
}

export function guessTypeOrDefault(filePath: string): string {
  return guessType(filePath) ?? DEFAULT_MIME_TYPE;
}
