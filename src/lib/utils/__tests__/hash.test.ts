import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import {
  generateFingerprint,
  generateItemId,
  quickMd5,
} from '../hash';

describe('Hash utils', () => {
  it('generateFingerprint returns 64 hex chars', () => {
    const h = generateFingerprint('Title', 'https://ex.com/a', 'summary');
    expect(h).toMatch(/^[a-f0-9]{64}$/);
  });

  it('generateFingerprint is deterministic', () => {
    const a = generateFingerprint('t', 'u', 's');
    const b = generateFingerprint('t', 'u', 's');
    expect(a).toBe(b);
  });

  it('generateFingerprint is case-sensitive', () => {
    const a = generateFingerprint('News', 'u', 's');
    const b = generateFingerprint('news', 'u', 's');
    expect(a).not.toBe(b);
  });

  it('generateFingerprint is whitespace-sensitive', () => {
    const a = generateFingerprint('Patch Tuesday', 'u', 's');
    const b = generateFingerprint('Patch  Tuesday', 'u', 's');
    expect(a).not.toBe(b);
  });

  it('generateFingerprint changes with the summary', () => {
    const a = generateFingerprint('t', 'u', 'first');
    const b = generateFingerprint('t', 'u', 'second');
    expect(a).not.toBe(b);
  });

  it('generateFingerprint hashes the pipe-joined tuple', () => {
    const expected = createHash('sha256').update('a|b|c').digest('hex');
    expect(generateFingerprint('a', 'b', 'c')).toBe(expected);
  });

  it('handles empty inputs', () => {
    expect(generateFingerprint('', '', '')).toMatch(/^[a-f0-9]{64}$/);
  });

  it('generateItemId is md5 of sourceId|key', () => {
    expect(generateItemId('feed-a', 'guid-1')).toBe(quickMd5('feed-a|guid-1'));
    expect(generateItemId('feed-a', 'guid-1')).toMatch(/^[a-f0-9]{32}$/);
  });

  it('generateItemId differs across sources for the same key', () => {
    expect(generateItemId('feed-a', 'guid-1')).not.toBe(generateItemId('feed-b', 'guid-1'));
  });

  it('quickMd5 matches a known digest', () => {
    expect(quickMd5('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });
});
