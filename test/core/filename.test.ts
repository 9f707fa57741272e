/**
 * Filename normalization tests.
 */

import { describe, expect, test } from 'vitest';
import { normalizeFilename } from '../../src/core/filename';

describe('normalizeFilename', () => {
  test('splits camelCase and lowercases', () => {
    expect(normalizeFilename('MyHolidayPhoto.JPG')).toBe(
      'my-holiday-photo.JPG'
    );
  });

  test('splits digit to uppercase boundaries', () => {
    expect(normalizeFilename('report2024Final.docx')).toBe(
      'report2024-final.docx'
    );
  });

  test('leaves acronyms joined', () => {
    expect(normalizeFilename('HTMLParser.ts')).toBe('htmlparser.ts');
  });

  test('spells out ampersands and drops apostrophes', () => {
    expect(normalizeFilename("Rock & Roll's Best.mp3")).toBe(
      'rock-and-rolls-best.mp3'
    );
  });

  test('applies every rule to one name', () => {
    expect(normalizeFilename("Tom & Jerry's BigShow!.MP4")).toBe(
      'tom-and-jerrys-big-show.MP4'
    );
  });

  test('collapses and trims separators', () => {
    expect(normalizeFilename('__init__.py')).toBe('init.py');
    expect(normalizeFilename('a -- b.txt')).toBe('a-b.txt');
  });

  test('keeps non-ASCII letters', () => {
    expect(normalizeFilename('Café Menu.pdf')).toBe('café-menu.pdf');
  });

  test('leaves normalized names unchanged', () => {
    expect(normalizeFilename('already-normal.txt')).toBe('already-normal.txt');
  });

  test('returns the input when the stem would be empty', () => {
    expect(normalizeFilename('!!!.txt')).toBe('!!!.txt');
  });
});
