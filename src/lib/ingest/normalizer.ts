/**
 * Maps raw feed entries onto IntelligenceItem records.
 * Pure: all time inputs come from the caller.
 */

import { DEFAULT_CATEGORY, type Category, type FeedSource, type IntelligenceItem } from '../db/models';
import { generateFingerprint, generateItemId } from '../utils/hash';
import { buildSummary } from '../utils/text';
import { normalizeArticleUrl } from '../utils/url';
import { detectSeverity } from './severity';

/** Parser-agnostic view of one feed entry. */
export interface RawFeedEntry {
  nativeId?: string;
  title?: string;
  link?: string;
  description?: string;
  content?: string;
  published?: string;
  updated?: string;
}

export function primaryCategory(source: FeedSource): Category {
  return source.categories[0] ?? DEFAULT_CATEGORY;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Returns null when the entry has neither title nor link.
 * `position` is the entry's index in the payload and only matters when the
 * entry carries no native id.
 */
export function normalizeEntry(
  source: FeedSource,
  entry: RawFeedEntry,
  fetchedAt: Date,
  position: number
): IntelligenceItem | null {
  const rawTitle = entry.title ?? '';
  const rawLink = entry.link ?? '';
  const title = nonEmpty(rawTitle);
  const link = nonEmpty(rawLink);
  if (!title && !link) return null;

  const url = link ? normalizeArticleUrl(link) : '';

  // description first, then full content; the raw text feeds the fingerprint
  const rawSummary = [entry.description, entry.content].find((text) => nonEmpty(text) !== undefined);
  const summary = rawSummary !== undefined ? buildSummary(rawSummary) : (title ?? url);

  const nativeId = nonEmpty(entry.nativeId);
  const idKey = nativeId ?? `${fetchedAt.toISOString()}#${position}`;

  const publishedAt = parseDate(entry.published) ?? parseDate(entry.updated) ?? fetchedAt;

  return {
    id: generateItemId(source.id, idKey),
    sourceId: source.id,
    category: primaryCategory(source),
    title: title ?? url,
    url,
    summary,
    publishedAt,
    retrievedAt: fetchedAt,
    contentHash: generateFingerprint(rawTitle, url, rawSummary ?? ''),
    severity: detectSeverity(title ?? '', summary),
  };
}

export function normalizeEntries(
  source: FeedSource,
  entries: readonly RawFeedEntry[],
  fetchedAt: Date
): IntelligenceItem[] {
  const items: IntelligenceItem[] = [];
  entries.forEach((entry, position) => {
    const item = normalizeEntry(source, entry, fetchedAt, position);
    if (item) items.push(item);
  });
  return items;
}
