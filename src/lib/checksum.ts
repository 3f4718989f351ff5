import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { getLogger } from './logger.js';

/** Chunk size used when streaming a file through the hash. */
export const FINGERPRINT_CHUNK_SIZE = 8192;

export type FingerprintAlgorithm = 'md5' | 'sha256';

/**
 * Calculate the content fingerprint of a file, streamed in 8 KiB chunks.
 * @param filePath Absolute path to file
 * @param algorithm Hash algorithm, MD5 (128-bit) unless told otherwise
 * @returns Promise that resolves with hex-encoded digest
 */
export async function calculateFileChecksum(
  filePath: string,
  algorithm: FingerprintAlgorithm = 'md5'
): Promise<string> {
  const logger = getLogger();
  const hash = createHash(algorithm);
  const stream = createReadStream(filePath, { highWaterMark: FINGERPRINT_CHUNK_SIZE });

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      const checksum = hash.digest('hex');
      logger.debug({ filePath, checksum }, 'File checksum calculated');
      resolve(checksum);
    });

    stream.on('error', (error) => {
      logger.error({ filePath, error }, 'Error calculating file checksum');
      reject(error);
    });
  });
}

/**
 * Calculate checksum from a buffer
 * @returns Hex-encoded digest
 */
export function calculateBufferChecksum(
  buffer: Buffer,
  algorithm: FingerprintAlgorithm = 'md5'
): string {
  const hash = createHash(algorithm);
  hash.update(buffer);
  return hash.digest('hex');
}
