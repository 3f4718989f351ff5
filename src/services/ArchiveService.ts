import { createWriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { dirname, join, resolve, sep } from 'path';
import archiver, { type Archiver } from 'archiver';
import * as unzipper from 'unzipper';
import { OperationType } from '../types/index.js';
import type { OperationSink } from './OperationLog.js';
import { pipeStreams } from '../lib/streams.js';
import { isDirectory, isFile } from '../lib/fsUtils.js';
import { FileOperationError, NotFoundError, TidyError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

/**
 * Write a zip archive to `outputPath`; `fill` adds the entries.
 * Resolves once the file is fully flushed and closed.
 */
export async function writeZip(outputPath: string, fill: (archive: Archiver) => void): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });

  const output = createWriteStream(outputPath);
  const archive = archiver('zip', { zlib: { level: 9 } });

  const closed = new Promise<void>((resolvePromise, reject) => {
    output.on('close', () => resolvePromise());
    output.on('error', reject);
    archive.on('error', reject);
  });

  archive.on('warning', (warning) => {
    createChildLogger({ outputPath }).warn({ error: warning }, 'Archive warning');
  });

  archive.pipe(output);
  fill(archive);

  await Promise.all([archive.finalize(), closed]);
}

export class ArchiveService {
  private operations: OperationSink;

  constructor(operations: OperationSink) {
    this.operations = operations;
  }

  /**
   * Zip a directory tree into `<outputName>.zip`; entry names are relative to `sourceDir`.
   * @returns path of the written archive
   */
  async compressDirectory(sourceDir: string, outputName: string): Promise<string> {
    const logger = createChildLogger({ sourceDir, archiveType: 'zip' });
    const zipPath = resolve(`${outputName}.zip`);

    if (!(await isDirectory(sourceDir))) {
      logger.error('Directory to compress does not exist');
      throw new NotFoundError(`Directory does not exist: ${sourceDir}`, { sourceDir });
    }

    try {
      await writeZip(zipPath, (archive) => {
        // Never pack the archive into itself when it is written inside the tree
        archive.directory(sourceDir, false, (entry) =>
          resolve(sourceDir, entry.name) === zipPath ? false : entry
        );
      });
    } catch (error) {
      logger.error({ error, zipPath }, 'Error compressing directory');
      throw new FileOperationError(`Error compressing directory ${sourceDir}`, { sourceDir, zipPath }, error);
    }

    logger.info({ zipPath }, 'Directory compressed');
    await this.operations.record(OperationType.COMPRESS_DIRECTORY, { path: sourceDir, output: zipPath });
    return zipPath;
  }

  /**
   * Extract every file of a zip archive below `extractTo`.
   * Entries whose path would land outside `extractTo` are rejected.
   * @returns extracted file paths
   */
  async decompressFile(zipPath: string, extractTo: string): Promise<string[]> {
    const logger = createChildLogger({ zipPath, archiveType: 'zip' });

    if (!(await isFile(zipPath))) {
      logger.error('Archive does not exist');
      throw new NotFoundError(`Archive does not exist: ${zipPath}`, { zipPath });
    }

    const root = resolve(extractTo);
    const extracted: string[] = [];

    try {
      await mkdir(root, { recursive: true });
      const directory = await unzipper.Open.file(zipPath);

      for (const file of directory.files) {
        const destination = resolve(join(root, file.path));

        if (destination !== root && !destination.startsWith(root + sep)) {
          throw new FileOperationError(`Archive entry escapes the extraction directory: ${file.path}`, {
            zipPath,
            entry: file.path,
          });
        }

        if (file.type === 'Directory') {
          await mkdir(destination, { recursive: true });
          continue;
        }

        logger.debug({ path: file.path }, 'Extracting ZIP entry');
        await mkdir(dirname(destination), { recursive: true });
        await pipeStreams(file.stream(), createWriteStream(destination));
        extracted.push(destination);
      }
    } catch (error) {
      logger.error({ error, extractTo: root }, 'Error decompressing file');
      if (error instanceof TidyError) {
        throw error;
      }
      throw new FileOperationError(`Error decompressing file ${zipPath}`, { zipPath, extractTo: root }, error);
    }

    logger.info({ extractTo: root, entryCount: extracted.length }, 'ZIP extraction complete');
    await this.operations.record(OperationType.DECOMPRESS_FILE, { zip_path: zipPath, extract_to: root });
    return extracted;
  }
}
