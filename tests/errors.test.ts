import fs from 'fs';
import os from 'os';
import path from 'path';

import {
  FilesystemError,
  ResourceExhaustedError,
  describeError,
  isErrnoException,
  toFilesystemError
} from '../src/services/errors';

async function missingFileError(): Promise<unknown> {
  return fs.promises.stat(path.join(os.tmpdir(), 'marker-desk-does-not-exist', 'file.pdf')).then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('isErrnoException', () => {
  it('recognizes errors raised by fs', async () => {
    const error = await missingFileError();

    expect(isErrnoException(error)).toBe(true);
    expect(isErrnoException(error) && error.code).toBe('ENOENT');
  });

  it('rejects values without a code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException(null)).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});

describe('toFilesystemError', () => {
  it('keeps the code and message of an fs error', async () => {
    const error = await missingFileError();
    const wrapped = toFilesystemError(error, 'read source');

    expect(wrapped).toBeInstanceOf(FilesystemError);
    expect(wrapped.code).toBe('ENOENT');
    expect(wrapped.message).toBe(`Failed to read source: ${describeError(error)}`);
    expect(wrapped.message).toContain('ENOENT: no such file or directory');
  });

  it('turns a full disk into a resource error', () => {
    const wrapped = toFilesystemError({ code: 'ENOSPC', message: 'no space left on device' }, 'write file');

    expect(wrapped).toBeInstanceOf(ResourceExhaustedError);
    expect(wrapped.kind).toBe('resource');
    expect(wrapped.message).toBe('Failed to write file: no space left on device');
  });
});

describe('describeError', () => {
  it('falls back for values without a message', () => {
    expect(describeError(42, 'unknown network error')).toBe('unknown network error');
    expect(describeError('boom')).toBe('boom');
  });
});
