/**
 * Content hasher.
 * Streams a file through SHA-256 and reports size and UTC mtime.
 *
 * @module src/ingestion/hasher
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { StoreResult } from '../store/types';
import { err, ok } from '../store/types';
import type { FileFingerprint } from './types';

/**
 * Format a timestamp as UTC "YYYY-MM-DD HH:MM:SS".
 */
export function formatModifiedAt(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Hash a regular file. IO_ERROR if it is missing, unreadable or not a file.
 */
export async function hashFile(
  absPath: string
): Promise<StoreResult<FileFingerprint>> {
  try {
    const info = await stat(absPath);
    if (!info.isFile()) {
      return err('IO_ERROR', `Not a regular file: ${absPath}`);
    }

    const hash = createHash('sha256');
    for await (const chunk of createReadStream(absPath)) {
      hash.update(chunk);
    }

    return ok({
      contentHash: hash.digest('hex'),
      sizeBytes: info.size,
      modifiedAt: formatModifiedAt(info.mtime),
    });
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : 'read failed';
    return err('IO_ERROR', `Cannot read ${absPath}: ${message}`, cause);
  }
}
