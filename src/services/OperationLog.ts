import { mkdir, open, readFile } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import type { OperationLogEntry } from '../models/OperationLogEntry.js';
import { createOperationLogEntry, operationLogEntrySchema } from '../models/OperationLogEntry.js';
import { getLogger } from '../lib/logger.js';
import { errnoCode, FileOperationError, NotFoundError } from '../lib/errors.js';

/**
 * Anything that accepts a record of a mutating operation.
 */
export interface OperationSink {
  record(operation: string, details: Record<string, string>): Promise<void>;
}

/**
 * Append-only JSON-lines log of mutating operations.
 * One handle per process run: open with `OperationLog.open`, release with `close`.
 */
export class OperationLog implements OperationSink {
  private handle: FileHandle | null;
  private readonly logPath: string;
  private logger = getLogger();
  // Appends are chained so entries land in call order
  private pending: Promise<void> = Promise.resolve();

  private constructor(logPath: string, handle: FileHandle) {
    this.logPath = logPath;
    this.handle = handle;
  }

  static async open(logPath: string): Promise<OperationLog> {
    await mkdir(dirname(logPath), { recursive: true });
    const handle = await open(logPath, 'a');
    getLogger().debug({ logPath }, 'Operation log opened');
    return new OperationLog(logPath, handle);
  }

  get path(): string {
    return this.logPath;
  }

  /**
   * Append one entry and flush it to disk.
   */
  async record(operation: string, details: Record<string, string>): Promise<void> {
    const entry = createOperationLogEntry(operation, details);
    const line = `${JSON.stringify(entry)}\n`;

    const write = this.pending.then(async () => {
      if (!this.handle) {
        throw new FileOperationError('Operation log is closed', { logPath: this.logPath, operation });
      }
      await this.handle.appendFile(line, 'utf8');
      await this.handle.datasync();
    });

    // Keep the chain alive for the next writer even if this one fails
    this.pending = write.catch(() => undefined);

    await write;
    this.logger.debug({ operation, details }, 'Operation recorded');
  }

  /**
   * Flush outstanding appends and release the file handle.
   */
  async close(): Promise<void> {
    await this.pending;
    if (this.handle) {
      await this.handle.close();
      this.handle = null;
      this.logger.debug({ logPath: this.logPath }, 'Operation log closed');
    }
  }
}

/**
 * Run `fn` with an open log, closing it on every exit path.
 */
export async function withOperationLog<T>(
  logPath: string,
  fn: (log: OperationLog) => Promise<T>
): Promise<T> {
  const log = await OperationLog.open(logPath);
  try {
    return await fn(log);
  } finally {
    await log.close();
  }
}

/**
 * Raw log contents, as written.
 */
export async function readOperationLog(logPath: string): Promise<string> {
  try {
    return await readFile(logPath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new NotFoundError(`Operation log does not exist: ${logPath}`, { logPath });
    }
    throw error;
  }
}

/**
 * Parse JSON-lines content. Lines that are not valid entries are skipped and logged.
 */
export function parseOperationLog(content: string): OperationLogEntry[] {
  const logger = getLogger();
  const entries: OperationLogEntry[] = [];

  for (const [index, line] of content.split('\n').entries()) {
    if (line.trim() === '') {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      logger.warn({ line: index + 1, error }, 'Skipping unparseable operation log line');
      continue;
    }

    const result = operationLogEntrySchema.safeParse(parsed);
    if (result.success) {
      entries.push(result.data);
    } else {
      logger.warn({ line: index + 1, issues: result.error.issues }, 'Skipping malformed operation log entry');
    }
  }

  return entries;
}

/**
 * Show the raw log through the logger and hand it back to the caller.
 */
export async function displayLog(logPath: string): Promise<string> {
  const content = await readOperationLog(logPath);
  getLogger().info({ logPath, entries: parseOperationLog(content).length }, 'Operation log contents');
  return content;
}
