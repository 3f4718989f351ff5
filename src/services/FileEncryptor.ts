import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { OperationType } from '../types/index.js';
import type { OperationSink } from './OperationLog.js';
import { decryptToken, encryptToken, generateFernetKey } from '../lib/fernet.js';
import { isFile } from '../lib/fsUtils.js';
import { FileOperationError, NotFoundError, TidyError } from '../lib/errors.js';
import { createChildLogger, getLogger } from '../lib/logger.js';

/**
 * Fernet key kept in a single file at a fixed, configured location.
 */
export class KeyStore {
  private keyPath: string;
  private logger = getLogger();

  constructor(keyPath: string) {
    this.keyPath = keyPath;
  }

  get path(): string {
    return this.keyPath;
  }

  async exists(): Promise<boolean> {
    return isFile(this.keyPath);
  }

  /** Write a fresh key, replacing any existing one. */
  async generate(): Promise<string> {
    const key = generateFernetKey();
    await mkdir(dirname(this.keyPath), { recursive: true });
    await writeFile(this.keyPath, key, { mode: 0o600 });
    this.logger.info({ keyPath: this.keyPath }, 'Encryption key generated');
    return key;
  }

  async load(): Promise<string> {
    if (!(await this.exists())) {
      throw new NotFoundError(`Encryption key not found: ${this.keyPath}`, { keyPath: this.keyPath });
    }
    return (await readFile(this.keyPath, 'utf8')).trim();
  }

  async loadOrGenerate(): Promise<string> {
    return (await this.exists()) ? this.load() : this.generate();
  }
}

export class FileEncryptor {
  private keyStore: KeyStore;
  private operations: OperationSink;

  constructor(keyStore: KeyStore, operations: OperationSink) {
    this.keyStore = keyStore;
    this.operations = operations;
  }

  /**
   * Replace the file's content with a Fernet token. A key is generated on first use.
   */
  async encryptFile(filePath: string): Promise<void> {
    const logger = createChildLogger({ filePath });
    await this.requireFile(filePath);

    const key = await this.keyStore.loadOrGenerate();

    try {
      const plaintext = await readFile(filePath);
      await this.replaceContent(filePath, encryptToken(key, plaintext));
    } catch (error) {
      logger.error({ error }, 'Error encrypting file');
      throw this.wrap(error, `Error encrypting file ${filePath}`, filePath);
    }

    logger.info('Encrypted file');
    await this.operations.record(OperationType.ENCRYPT, { file: filePath });
  }

  /**
   * Restore a file encrypted by `encryptFile`. Requires the key file to exist.
   */
  async decryptFile(filePath: string): Promise<void> {
    const logger = createChildLogger({ filePath });
    await this.requireFile(filePath);

    if (!(await this.keyStore.exists())) {
      logger.error({ keyPath: this.keyStore.path }, 'Encryption key not found');
      throw new NotFoundError(`Encryption key not found: ${this.keyStore.path}`, { keyPath: this.keyStore.path });
    }
    const key = await this.keyStore.load();

    try {
      const token = await readFile(filePath, 'utf8');
      await this.replaceContent(filePath, decryptToken(key, token));
    } catch (error) {
      logger.error({ error }, 'Error decrypting file');
      throw this.wrap(error, `Error decrypting file ${filePath}`, filePath);
    }

    logger.info('Decrypted file');
    await this.operations.record(OperationType.DECRYPT, { file: filePath });
  }

  private async requireFile(filePath: string): Promise<void> {
    if (!(await isFile(filePath))) {
      createChildLogger({ filePath }).error('File does not exist');
      throw new NotFoundError(`File does not exist: ${filePath}`, { file: filePath });
    }
  }

  // Written beside the file, then renamed over it
  private async replaceContent(filePath: string, content: string | Buffer): Promise<void> {
    const temporary = `${filePath}.tidyfs-tmp`;
    try {
      await writeFile(temporary, content);
      await rename(temporary, filePath);
    } catch (error) {
      await rm(temporary, { force: true });
      throw error;
    }
  }

  private wrap(error: unknown, message: string, filePath: string): TidyError {
    if (error instanceof TidyError) {
      return error;
    }
    return new FileOperationError(message, { file: filePath }, error);
  }
}
