import { pipeline } from 'stream/promises';
import type { Readable, Writable } from 'stream';
import { getLogger } from './logger.js';

/**
 * Pipe a source into a destination; both are closed on success and on failure.
 */
export async function pipeStreams(source: Readable, destination: Writable): Promise<void> {
  try {
    await pipeline(source, destination);
  } catch (error) {
    getLogger().error({ error }, 'Stream pipeline error');
    throw error;
  }
}
