import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync } from 'fs';
import { join } from 'path';
import { createToolkit } from '../../src/toolkit.js';
import { createTempDir, RecordingSink, removeTempDir, writeTestFile } from '../helpers.js';

describe('createToolkit', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(workDir);
  });

  it('should keep the encryption key at the configured path', async () => {
    const keyPath = join(workDir, 'keys', 'tidyfs.key');
    const sink = new RecordingSink();
    const toolkit = createToolkit(
      { storage: { operationLogPath: join(workDir, 'ops.log'), encryptionKeyPath: keyPath }, duplicates: { confirmContent: true } },
      sink
    );

    await toolkit.encryptor.encryptFile(writeTestFile(join(workDir, 'a.txt'), 'a'));

    expect(existsSync(keyPath)).toBe(true);
    expect(sink.entries.map((entry) => entry.operation)).toEqual(['encrypt']);
  });

  it('should share one sink across services', async () => {
    const sink = new RecordingSink();
    const toolkit = createToolkit(
      { storage: { operationLogPath: '', encryptionKeyPath: join(workDir, 'k') }, duplicates: { confirmContent: false } },
      sink
    );

    await toolkit.documents.createTextFile(workDir, 'note', 'hi');
    await toolkit.files.copyFile(join(workDir, 'note.txt'), join(workDir, 'copy.txt'));
    const report = await toolkit.duplicates.findDuplicates(workDir);

    expect(sink.entries.map((entry) => entry.operation)).toEqual(['create_text_file', 'copy']);
    expect(report.duplicates).toEqual([{ path: join(workDir, 'note.txt'), originalPath: join(workDir, 'copy.txt') }]);
  });
});
