import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { join } from 'path';
import { DuplicateDetector, findDuplicates } from '../../src/services/DuplicateDetector.js';
import { NotFoundError } from '../../src/lib/errors.js';
import * as checksum from '../../src/lib/checksum.js';
import { createTempDir, removeTempDir, writeTestFile } from '../helpers.js';

describe('DuplicateDetector', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeTempDir(root);
  });

  it('should report the later file against the first one seen', async () => {
    writeTestFile(join(root, 'x.txt'), 'hello');
    writeTestFile(join(root, 'y.txt'), 'hello');
    writeTestFile(join(root, 'z.txt'), 'world');

    const report = await findDuplicates(root);

    expect(report.duplicates).toEqual([{ path: join(root, 'y.txt'), originalPath: join(root, 'x.txt') }]);
    expect(report.errors).toEqual([]);
    expect(report.filesScanned).toBe(3);
  });

  it('should point every copy at the same original', async () => {
    writeTestFile(join(root, 'a.txt'), 'same');
    writeTestFile(join(root, 'b.txt'), 'same');
    writeTestFile(join(root, 'c.txt'), 'same');

    const report = await new DuplicateDetector().findDuplicates(root);

    expect(report.duplicates).toEqual([
      { path: join(root, 'b.txt'), originalPath: join(root, 'a.txt') },
      { path: join(root, 'c.txt'), originalPath: join(root, 'a.txt') },
    ]);
  });

  it('should walk subdirectories depth-first in name order', async () => {
    writeTestFile(join(root, 'b', 'copy.txt'), 'shared');
    writeTestFile(join(root, 'a', 'inner', 'first.txt'), 'shared');
    writeTestFile(join(root, 'c.txt'), 'shared');

    const report = await findDuplicates(root);

    expect(report.duplicates).toEqual([
      { path: join(root, 'b', 'copy.txt'), originalPath: join(root, 'a', 'inner', 'first.txt') },
      { path: join(root, 'c.txt'), originalPath: join(root, 'a', 'inner', 'first.txt') },
    ]);
  });

  it('should report nothing when every file is distinct', async () => {
    writeTestFile(join(root, 'one.txt'), '1');
    writeTestFile(join(root, 'two.txt'), '2');

    const report = await findDuplicates(root);

    expect(report.duplicates).toEqual([]);
    expect(report.filesScanned).toBe(2);
  });

  it('should treat empty files as duplicates of each other', async () => {
    writeTestFile(join(root, 'empty1'), '');
    writeTestFile(join(root, 'empty2'), '');

    const report = await findDuplicates(root);

    expect(report.duplicates).toEqual([{ path: join(root, 'empty2'), originalPath: join(root, 'empty1') }]);
  });

  it('should accept a digest match without reading bytes when confirmation is off', async () => {
    writeTestFile(join(root, 'x.txt'), 'hello');
    writeTestFile(join(root, 'y.txt'), 'hello');

    const report = await findDuplicates(root, { confirmContent: false });

    expect(report.duplicates).toEqual([{ path: join(root, 'y.txt'), originalPath: join(root, 'x.txt') }]);
  });

  it('should return an empty report for an empty directory', async () => {
    const report = await findDuplicates(root);
    expect(report).toEqual({ duplicates: [], errors: [], filesScanned: 0 });
  });

  it('should fail with NotFoundError for a missing directory', async () => {
    await expect(findDuplicates(join(root, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should not modify the files it scans', async () => {
    const first = writeTestFile(join(root, 'x.txt'), 'hello');
    const second = writeTestFile(join(root, 'y.txt'), 'hello');

    await findDuplicates(root);
    const again = await findDuplicates(root);

    expect(again.duplicates).toEqual([{ path: second, originalPath: first }]);
  });

  describe('with a stubbed fingerprint', () => {
    const realChecksum = checksum.calculateFileChecksum;

    it('should skip an unreadable file and keep it out of the index', async () => {
      const first = writeTestFile(join(root, 'a.txt'), 'same');
      const locked = writeTestFile(join(root, 'locked.txt'), 'same');
      const last = writeTestFile(join(root, 'z.txt'), 'same');
      jest.spyOn(checksum, 'calculateFileChecksum').mockImplementation(async (filePath, algorithm) => {
        if (filePath === locked) {
          throw Object.assign(new Error(`EACCES: permission denied, open '${locked}'`), { code: 'EACCES' });
        }
        return realChecksum(filePath, algorithm);
      });

      const report = await findDuplicates(root);

      expect(report.errors).toEqual([{ path: locked, message: `EACCES: permission denied, open '${locked}'` }]);
      expect(report.duplicates).toEqual([{ path: last, originalPath: first }]);
      expect(report.filesScanned).toBe(3);
    });

    it('should keep a digest match with different bytes as a new original', async () => {
      const one = writeTestFile(join(root, 'a.txt'), 'one');
      const two = writeTestFile(join(root, 'b.txt'), 'two');
      const oneAgain = writeTestFile(join(root, 'c.txt'), 'one');
      const twoAgain = writeTestFile(join(root, 'd.txt'), 'two');
      jest.spyOn(checksum, 'calculateFileChecksum').mockResolvedValue('0123456789abcdef0123456789abcdef');

      const report = await findDuplicates(root);

      expect(report.duplicates).toEqual([
        { path: oneAgain, originalPath: one },
        { path: twoAgain, originalPath: two },
      ]);
      expect(report.errors).toEqual([]);
    });

    it('should trust the digest alone when confirmation is off', async () => {
      const one = writeTestFile(join(root, 'a.txt'), 'one');
      const two = writeTestFile(join(root, 'b.txt'), 'two');
      jest.spyOn(checksum, 'calculateFileChecksum').mockResolvedValue('0123456789abcdef0123456789abcdef');

      const report = await findDuplicates(root, { confirmContent: false });

      expect(report.duplicates).toEqual([{ path: two, originalPath: one }]);
    });
  });
});
