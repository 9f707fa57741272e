import { describe, expect, test } from 'vitest';
import { setColorsEnabled } from '../../src/cli/colors';
import { formatBytes, formatStatus } from '../../src/cli/commands/status';
import { formatClassification } from '../../src/cli/commands/verify';

describe('formatBytes', () => {
  test('keeps small counts in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  test('scales to one decimal', () => {
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});

describe('formatClassification', () => {
  test('prints one line per kind', () => {
    setColorsEnabled(false);
    expect(formatClassification({ kind: 'new', path: 'a.txt' })).toBe(
      'New file: a.txt'
    );
    expect(
      formatClassification({ kind: 'moved', oldPath: 'a.txt', newPath: 'b.txt' })
    ).toBe('Moved/renamed: a.txt -> b.txt');
    expect(
      formatClassification({
        kind: 'duplicate',
        path: 'b.txt',
        originalPath: 'a.txt',
      })
    ).toBe('Duplicate: b.txt (same content as a.txt)');
    expect(formatClassification({ kind: 'missing', path: 'a.txt' })).toBe(
      'Missing file: a.txt'
    );
    setColorsEnabled(true);
  });
});

describe('formatStatus', () => {
  test('lists catalog counts', () => {
    setColorsEnabled(false);
    const text = formatStatus({
      success: true,
      data: {
        dbPath: '/srv/catalog/.stowl',
        root: '/srv/catalog',
        configPath: '/srv/catalog/.stowl.yml',
        schemaVersion: 1,
        files: 3,
        distinctHashes: 2,
        totalBytes: 2048,
        taxonomies: 2,
        tags: 4,
        associations: 5,
      },
    });
    setColorsEnabled(true);

    expect(text).toBe(
      [
        'Catalog: /srv/catalog/.stowl',
        'Root: /srv/catalog',
        'Schema: v1',
        '',
        'Files: 3 (2 distinct, 2.0 KB)',
        'Taxonomies: 2',
        'Tags: 4',
        'Tag links: 5',
      ].join('\n')
    );
  });

  test('reports failures', () => {
    expect(formatStatus({ success: false, error: 'boom' })).toBe('Error: boom');
  });
});
