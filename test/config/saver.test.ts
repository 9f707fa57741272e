import { readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createDefaultConfig } from '../../src/config/defaults';
import { loadConfigFromPath } from '../../src/config/loader';
import { saveConfigToPath } from '../../src/config/saver';
import type { Config } from '../../src/config/types';
import { safeRm } from '../helpers/cleanup';

describe('saveConfigToPath', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `stowl-test-${Date.now()}-${process.pid}`);
  });

  afterEach(async () => {
    await safeRm(tempDir);
  });

  test('saves default config and loads it back', async () => {
    const config = createDefaultConfig();
    const filePath = join(tempDir, 'nested', '.stowl.yml');

    const saveResult = await saveConfigToPath(config, filePath);
    expect(saveResult).toEqual({ ok: true, path: filePath });

    const loadResult = await loadConfigFromPath(filePath);
    expect(loadResult).toEqual({ ok: true, value: config });
  });

  test('preserves every field', async () => {
    const config: Config = {
      version: '1.0',
      exclude: ['*.bak'],
      includeHidden: true,
      detectDuplicates: true,
    };
    const filePath = join(tempDir, '.stowl.yml');

    await saveConfigToPath(config, filePath);

    expect(await readFile(filePath, 'utf8')).toBe(
      [
        "version: '1.0'",
        'exclude:',
        "  - '*.bak'",
        'includeHidden: true',
        'detectDuplicates: true',
        '',
      ].join('\n')
    );
  });

  test('rejects an invalid config without writing', async () => {
    const config: Config = { ...createDefaultConfig(), exclude: [''] };
    const filePath = join(tempDir, '.stowl.yml');

    const result = await saveConfigToPath(config, filePath);
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid config: Exclude entries cannot be empty',
      },
    });
    const loaded = await loadConfigFromPath(filePath);
    expect(loaded.ok).toBe(false);
  });
});
