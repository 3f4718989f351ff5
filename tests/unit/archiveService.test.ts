import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ArchiveService } from '../../src/services/ArchiveService.js';
import { FileOperationError, NotFoundError } from '../../src/lib/errors.js';
import { createTempDir, RecordingSink, removeTempDir, writeTestFile } from '../helpers.js';

describe('ArchiveService', () => {
  let workDir: string;
  let sink: RecordingSink;
  let service: ArchiveService;

  beforeEach(() => {
    workDir = createTempDir();
    sink = new RecordingSink();
    service = new ArchiveService(sink);
  });

  afterEach(() => {
    removeTempDir(workDir);
  });

  it('should compress a tree and extract it back', async () => {
    const tree = join(workDir, 'project');
    writeTestFile(join(tree, 'readme.txt'), 'read me');
    writeTestFile(join(tree, 'src', 'main.ts'), 'export {};');

    const zipPath = await service.compressDirectory(tree, join(workDir, 'backup'));
    expect(zipPath).toBe(join(workDir, 'backup.zip'));

    const outDir = join(workDir, 'restored');
    const extracted = await service.decompressFile(zipPath, outDir);

    expect(extracted.sort()).toEqual([join(outDir, 'readme.txt'), join(outDir, 'src', 'main.ts')]);
    expect(readFileSync(join(outDir, 'readme.txt'), 'utf8')).toBe('read me');
    expect(readFileSync(join(outDir, 'src', 'main.ts'), 'utf8')).toBe('export {};');
  });

  it('should record both operations', async () => {
    const tree = join(workDir, 'project');
    writeTestFile(join(tree, 'a.txt'), 'a');
    const outDir = join(workDir, 'out');

    const zipPath = await service.compressDirectory(tree, join(workDir, 'backup'));
    await service.decompressFile(zipPath, outDir);

    expect(sink.entries).toEqual([
      { operation: 'compress_directory', details: { path: tree, output: zipPath } },
      { operation: 'decompress_file', details: { zip_path: zipPath, extract_to: outDir } },
    ]);
  });

  it('should not pack the archive into itself', async () => {
    const tree = join(workDir, 'project');
    writeTestFile(join(tree, 'a.txt'), 'a');

    const zipPath = await service.compressDirectory(tree, join(tree, 'self'));
    const extracted = await service.decompressFile(zipPath, join(workDir, 'out'));

    expect(extracted).toEqual([join(workDir, 'out', 'a.txt')]);
  });

  it('should fail with NotFoundError for a missing directory', async () => {
    await expect(service.compressDirectory(join(workDir, 'none'), join(workDir, 'x'))).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(existsSync(join(workDir, 'x.zip'))).toBe(false);
  });

  it('should fail with NotFoundError for a missing archive', async () => {
    await expect(service.decompressFile(join(workDir, 'none.zip'), workDir)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject a file that is not a zip archive', async () => {
    const fake = writeTestFile(join(workDir, 'fake.zip'), 'not a zip');

    await expect(service.decompressFile(fake, join(workDir, 'out'))).rejects.toBeInstanceOf(FileOperationError);
    expect(sink.entries).toEqual([]);
  });
});
