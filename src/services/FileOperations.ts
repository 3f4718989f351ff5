import { createReadStream } from 'fs';
import { cp, mkdir, readdir, readFile, rename, rm, stat } from 'fs/promises';
import { basename, join } from 'path';
import { createInterface } from 'readline';
import { CollisionPolicy, OperationType } from '../types/index.js';
import type { OperationSink } from './OperationLog.js';
import { ModificationDateModel } from './Classifier.js';
import { Organizer, type OrganizeResult } from './Organizer.js';
import { guessType } from '../lib/mime.js';
import { isDirectory, isFile, moveEntry, pathExists, walkFiles } from '../lib/fsUtils.js';
import { FileOperationError, NotFoundError, toError } from '../lib/errors.js';
import { createChildLogger, getLogger } from '../lib/logger.js';

export const SUMMARY_LENGTH = 100;

export interface FileDetails {
  size: number;
  created: Date;
  modified: Date;
  type: string | null;
}

/**
 * Single-path file and directory operations. Each mutation is logged and recorded;
 * a failure is logged and raised to the caller.
 */
export class FileOperations {
  private operations: OperationSink;
  private logger = getLogger();

  constructor(operations: OperationSink) {
    this.operations = operations;
  }

  /**
   * Move a file or folder. When `target` is an existing directory the source lands inside it.
   * @returns final path of the moved entry
   */
  async moveFile(source: string, target: string): Promise<string> {
    await this.requireExists(source);
    const destination = (await isDirectory(target)) ? join(target, basename(source)) : target;

    try {
      await moveEntry(source, destination);
    } catch (error) {
      this.logger.error({ source, target: destination, error }, 'Error moving entry');
      throw new FileOperationError(`Error moving ${source} to ${destination}`, { source, target: destination }, error);
    }

    this.logger.info({ source, target: destination }, 'Moved');
    await this.operations.record(OperationType.MOVE, { source, target: destination });
    return destination;
  }

  /**
   * Copy a file or folder. A folder copied onto an existing folder is merged into it.
   * @returns final path of the copy
   */
  async copyFile(source: string, target: string): Promise<string> {
    await this.requireExists(source);
    const sourceIsDirectory = await isDirectory(source);
    const destination =
      !sourceIsDirectory && (await isDirectory(target)) ? join(target, basename(source)) : target;

    try {
      await cp(source, destination, { recursive: sourceIsDirectory, force: true, preserveTimestamps: true });
    } catch (error) {
      this.logger.error({ source, target: destination, error }, 'Error copying entry');
      throw new FileOperationError(`Error copying ${source} to ${destination}`, { source, target: destination }, error);
    }

    this.logger.info({ source, target: destination }, 'Copied');
    await this.operations.record(OperationType.COPY, { source, target: destination });
    return destination;
  }

  /** Delete a file or a whole folder. */
  async deleteFile(path: string): Promise<void> {
    await this.requireExists(path);

    try {
      await rm(path, { recursive: true });
    } catch (error) {
      this.logger.error({ path, error }, 'Error deleting entry');
      throw new FileOperationError(`Error deleting ${path}`, { path }, error);
    }

    this.logger.info({ path }, 'Deleted');
    await this.operations.record(OperationType.DELETE, { path });
  }

  /**
   * @returns false when the directory was already there
   */
  async createDirectory(parent: string, name: string): Promise<boolean> {
    const fullPath = join(parent, name);

    if (await pathExists(fullPath)) {
      this.logger.warn({ path: fullPath }, 'Directory already exists');
      return false;
    }

    try {
      await mkdir(fullPath, { recursive: true });
    } catch (error) {
      this.logger.error({ path: fullPath, error }, 'Error creating directory');
      throw new FileOperationError(`Error creating directory ${fullPath}`, { path: fullPath }, error);
    }

    this.logger.info({ path: fullPath }, 'Created directory');
    await this.operations.record(OperationType.CREATE_DIRECTORY, { path: fullPath });
    return true;
  }

  /**
   * @returns false when there was no such directory
   */
  async deleteDirectory(parent: string, name: string): Promise<boolean> {
    const fullPath = join(parent, name);

    if (!(await isDirectory(fullPath))) {
      this.logger.warn({ path: fullPath }, 'Directory does not exist');
      return false;
    }

    try {
      await rm(fullPath, { recursive: true });
    } catch (error) {
      this.logger.error({ path: fullPath, error }, 'Error deleting directory');
      throw new FileOperationError(`Error deleting directory ${fullPath}`, { path: fullPath }, error);
    }

    this.logger.info({ path: fullPath }, 'Deleted directory');
    await this.operations.record(OperationType.DELETE_DIRECTORY, { path: fullPath });
    return true;
  }

  /**
   * @returns false when there was no such directory
   */
  async renameDirectory(parent: string, currentName: string, newName: string): Promise<boolean> {
    const from = join(parent, currentName);
    const to = join(parent, newName);

    if (!(await isDirectory(from))) {
      this.logger.warn({ path: from }, 'Directory does not exist');
      return false;
    }

    try {
      await rename(from, to);
    } catch (error) {
      this.logger.error({ from, to, error }, 'Error renaming directory');
      throw new FileOperationError(`Error renaming directory from ${from} to ${to}`, { from, to }, error);
    }

    this.logger.info({ from, to }, 'Renamed directory');
    await this.operations.record(OperationType.RENAME_DIRECTORY, { from, to });
    return true;
  }

  /** Entry names in a directory, [] when it does not exist. */
  async listFiles(path: string): Promise<string[]> {
    if (!(await isDirectory(path))) {
      this.logger.warn({ path }, 'Directory does not exist');
      return [];
    }

    const files = await readdir(path);
    this.logger.info({ path, files }, 'Listed directory');
    return files;
  }

  /** Size, timestamps and MIME type, or null when there is nothing at `path`. */
  async viewFileMetadata(path: string): Promise<FileDetails | null> {
    if (!(await pathExists(path))) {
      this.logger.warn({ path }, 'File does not exist');
      return null;
    }

    const stats = await stat(path);
    const details: FileDetails = {
      size: stats.size,
      created: stats.birthtime,
      modified: stats.mtime,
      type: guessType(path),
    };

    this.logger.info({ path, metadata: details }, 'File metadata');
    return details;
  }

  /**
   * First `lines` lines of a text file joined with '\n', or null when it is not a file.
   */
  async previewFile(path: string, lines = 10): Promise<string | null> {
    if (!(await isFile(path))) {
      this.logger.warn({ path }, 'File does not exist or is not a text file');
      return null;
    }

    const stream = createReadStream(path, { encoding: 'utf8' });
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    const collected: string[] = [];

    try {
      for await (const line of reader) {
        if (collected.length >= lines) {
          break;
        }
        collected.push(line);
      }
    } finally {
      reader.close();
      stream.destroy();
    }

    const preview = collected.join('\n');
    this.logger.info({ path, lines: collected.length }, 'File preview');
    return preview;
  }

  /** First 100 characters of a text file, or null when it is not a file. */
  async summarizeFile(path: string): Promise<string | null> {
    if (!(await isFile(path))) {
      this.logger.error({ path }, 'Not a file');
      return null;
    }

    const content = await readFile(path, 'utf8');
    const summary = content.slice(0, SUMMARY_LENGTH);
    this.logger.info({ path, summary }, 'File summary');
    return summary;
  }

  /**
   * Files below `directory` whose name or text content contains `keyword`, case-insensitively.
   * Unreadable files are logged and skipped.
   */
  async searchFiles(directory: string, keyword: string): Promise<string[]> {
    if (!(await isDirectory(directory))) {
      this.logger.error({ directory }, 'Directory does not exist');
      throw new NotFoundError(`Directory does not exist: ${directory}`, { directory });
    }

    const needle = keyword.toLowerCase();
    const matches: string[] = [];
    const onError = (path: string, error: Error) => {
      createChildLogger({ filePath: path }).error({ error }, 'Error reading entry');
    };

    for await (const filePath of walkFiles(directory, onError)) {
      if (basename(filePath).toLowerCase().includes(needle)) {
        matches.push(filePath);
        continue;
      }

      try {
        const content = await readFile(filePath, 'utf8');
        if (content.toLowerCase().includes(needle)) {
          matches.push(filePath);
        }
      } catch (error) {
        onError(filePath, toError(error));
      }
    }

    this.logger.info({ directory, keyword, matches: matches.length }, 'Search complete');
    return matches;
  }

  /**
   * Move each file directly inside `sourceDir` into `targetDir/YYYY-MM-DD/` by modification date.
   */
  async sortFilesByDate(
    sourceDir: string,
    targetDir: string,
    collisionPolicy: CollisionPolicy = CollisionPolicy.RENAME
  ): Promise<OrganizeResult> {
    const organizer = new Organizer(new ModificationDateModel(), this.operations, { collisionPolicy });
    return organizer.organize(sourceDir, targetDir);
  }

  private async requireExists(path: string): Promise<void> {
    if (!(await pathExists(path))) {
      this.logger.error({ path }, 'Path does not exist');
      throw new NotFoundError(`Path does not exist: ${path}`, { path });
    }
  }
}
