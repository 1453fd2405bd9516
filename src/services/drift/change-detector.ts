// Byte-level change detection for published files

import { createHash } from 'crypto';
import * as fs from 'fs/promises';

/**
 * SHA-256 hex digest of a file's bytes
 */
export type ContentFingerprint = string;

export type ChangeKind = 'created' | 'unchanged' | 'changed';

/**
 * Digests raw bytes, so reformatting alone registers as a change
 */
export function computeFingerprint(content: string | Uint8Array): ContentFingerprint {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Fingerprints the file at `filePath`
 *
 * @returns null when the file does not exist
 */
export async function fingerprintFile(filePath: string): Promise<ContentFingerprint | null> {
  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  return computeFingerprint(content);
}

/**
 * Compares fingerprints taken before and after a publish
 */
export function classifyChange(before: ContentFingerprint | null, after: ContentFingerprint): ChangeKind {
  if (before === null) {
    return 'created';
  }
  return before === after ? 'unchanged' : 'changed';
}
