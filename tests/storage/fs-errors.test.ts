import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { errnoCode, isAlreadyExists, isNotFound } from '../../src/storage/fs-errors';

describe('errno helpers', () => {
  test('recognise errors raised by fs', async () => {
    const missing = await fs.readFile(path.join(os.tmpdir(), 'host-provisioner-missing', 'absent')).catch((err: unknown) => err);
    expect(errnoCode(missing)).toBe('ENOENT');
    expect(isNotFound(missing)).toBe(true);
  });

  test('only look at the code property', () => {
    expect(isAlreadyExists({ code: 'EEXIST', message: 'exists' })).toBe(true);
    expect(isNotFound({ code: 'EACCES' })).toBe(false);
    expect(errnoCode({ code: 2 })).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});
