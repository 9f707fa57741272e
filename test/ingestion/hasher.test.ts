/**
 * Hasher tests.
 * @module test/ingestion/hasher.test
 */

import { mkdir, mkdtemp, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { formatModifiedAt, hashFile } from '../../src/ingestion/hasher';
import { safeRm } from '../helpers/cleanup';

const HELLO_SHA256 =
  '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'stowl-hasher-'));
  await writeFile(join(dir, 'hello.txt'), 'hello');
  await writeFile(join(dir, 'copy.txt'), 'hello');
  await writeFile(join(dir, 'other.txt'), 'hello!');
  await writeFile(join(dir, 'empty.txt'), '');
  await mkdir(join(dir, 'sub'));
});

afterAll(async () => {
  await safeRm(dir);
});

describe('formatModifiedAt', () => {
  test('formats as UTC without T or milliseconds', () => {
    const date = new Date(Date.UTC(2024, 2, 1, 10, 0, 5, 123));
    expect(formatModifiedAt(date)).toBe('2024-03-01 10:00:05');
  });
});

describe('hashFile', () => {
  test('returns SHA-256, size and mtime', async () => {
    const path = join(dir, 'hello.txt');
    const mtime = new Date(Date.UTC(2023, 11, 31, 23, 59, 58));
    await utimes(path, mtime, mtime);

    const result = await hashFile(path);
    expect(result).toEqual({
      ok: true,
      value: {
        contentHash: HELLO_SHA256,
        sizeBytes: 5,
        modifiedAt: '2023-12-31 23:59:58',
      },
    });
  });

  test('hashes empty files', async () => {
    const result = await hashFile(join(dir, 'empty.txt'));
    expect(result.ok && result.value.contentHash).toBe(EMPTY_SHA256);
    expect(result.ok && result.value.sizeBytes).toBe(0);
  });

  test('digest depends only on the bytes', async () => {
    const copy = await hashFile(join(dir, 'copy.txt'));
    const other = await hashFile(join(dir, 'other.txt'));

    expect(copy.ok && copy.value.contentHash).toBe(HELLO_SHA256);
    expect(other.ok && other.value.contentHash).not.toBe(HELLO_SHA256);
  });

  test('missing path is IO_ERROR', async () => {
    const result = await hashFile(join(dir, 'gone.txt'));
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('IO_ERROR');
    expect(result.error.message.startsWith(`Cannot read ${join(dir, 'gone.txt')}`)).toBe(true);
  });

  test('directory is IO_ERROR', async () => {
    const result = await hashFile(join(dir, 'sub'));
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('IO_ERROR');
    expect(result.error.message).toBe(`Not a regular file: ${join(dir, 'sub')}`);
  });
});
