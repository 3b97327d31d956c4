/**
 * Content Hash Utilities
 * - SHA256 fingerprint for dedupe
 * - MD5 for compact item identifiers
 */

import { createHash } from 'crypto';

/**
 * SHA256 over the exact tuple (title | url | rawSummary).
 * No case folding or whitespace collapsing: two entries share a fingerprint
 * only when all three strings are identical.
 */
export function generateFingerprint(title: string, url: string, rawSummary: string): string {
  const content = `${title}|${url}|${rawSummary}`;
  return createHash('sha256').update(content).digest('hex');
}

/** MD5 over `sourceId|key`, where key is the entry's native id or a fallback. */
export function generateItemId(sourceId: string, key: string): string {
  return quickMd5(`${sourceId}|${key}`);
}

export function quickMd5(input: string): string {
  return createHash('md5').update(input).digest('hex');
}
