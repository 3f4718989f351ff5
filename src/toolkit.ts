import type { AppConfig } from './types/index.js';
import type { OperationSink } from './services/OperationLog.js';
import { FileOperations } from './services/FileOperations.js';
import { ArchiveService } from './services/ArchiveService.js';
import { FileEncryptor, KeyStore } from './services/FileEncryptor.js';
import { DocumentWriter } from './services/DocumentWriter.js';
import { DuplicateDetector } from './services/DuplicateDetector.js';

export interface Toolkit {
  files: FileOperations;
  archives: ArchiveService;
  encryptor: FileEncryptor;
  documents: DocumentWriter;
  duplicates: DuplicateDetector;
}

/**
 * Wire the single-path services to one operation sink and the loaded configuration.
 */
export function createToolkit(config: Pick<AppConfig, 'storage' | 'duplicates'>, operations: OperationSink): Toolkit {
  return {
    files: new FileOperations(operations),
    archives: new ArchiveService(operations),
    encryptor: new FileEncryptor(new KeyStore(config.storage.encryptionKeyPath), operations),
    documents: new DocumentWriter(operations),
    duplicates: new DuplicateDetector(config.duplicates),
  };
}
