import { describe, it, expect } from '@jest/globals';
import {
  ClassificationError,
  errnoCode,
  ErrorCodes,
  isErrorLike,
  FileOperationError,
  NotFoundError,
  TidyError,
  toError,
} from '../../src/lib/errors.js';

describe('errors', () => {
  it('should carry a code, context and cause', () => {
    const cause = new Error('EACCES');
    const error = new FileOperationError('Error moving a to b', { source: 'a', target: 'b' }, cause);

    expect(error).toBeInstanceOf(TidyError);
    expect(error.name).toBe('FileOperationError');
    expect(error.code).toBe(ErrorCodes.IO_ERROR);
    expect(error.context).toEqual({ source: 'a', target: 'b' });
    expect(error.cause).toBe(cause);
  });

  it('should serialize to plain JSON', () => {
    const error = new NotFoundError('Source directory does not exist: /x', { sourceDir: '/x' });

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'NotFoundError',
      message: 'Source directory does not exist: /x',
      code: 'NOT_FOUND',
      context: { sourceDir: '/x' },
    });
  });

  it('should keep classification failures distinct from I/O failures', () => {
    expect(new ClassificationError('bad label')).not.toBeInstanceOf(FileOperationError);
  });

  it('should narrow unknown values to Error', () => {
    const error = new Error('kept');

    expect(toError(error)).toBe(error);
    expect(toError('plain').message).toBe('plain');
  });

  it('should read system error codes', () => {
    const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });

    expect(errnoCode(error)).toBe('ENOENT');
    expect(errnoCode(new Error('x'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });

  it('should recognise errors by shape when instanceof does not hold', () => {
    const foreign = { name: 'Error', message: "ENOENT: no such file or directory, stat '/none'", code: 'ENOENT' };

    expect(isErrorLike(foreign)).toBe(true);
    expect(errnoCode(foreign)).toBe('ENOENT');
    expect(toError(foreign)).toBe(foreign);
    expect(isErrorLike({ message: 'no name' })).toBe(false);
  });

  it('should read the code of errors raised by fs', async () => {
    const { stat } = await import('fs/promises');
    const error = await stat('/definitely/not/here').catch((e: unknown) => e);

    expect(errnoCode(error)).toBe('ENOENT');
    expect(toError(error)).toBe(error);
  });
});
