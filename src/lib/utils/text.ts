/**
 * Text helpers for feed summaries
 */

export const SUMMARY_MAX_LENGTH = 500;
export const TRUNCATION_MARKER = '...';

function fromCodePoint(code: number): string {
  // out-of-range references decode to nothing
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return '';
  return String.fromCodePoint(code);
}

/** Decode the handful of entities feeds actually emit. */
export function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (_, d: string) => fromCodePoint(Number(d)))
    .replace(/&#x([0-9a-f]+);/gi, (_, h: string) => fromCodePoint(parseInt(h, 16)))
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;|&apos;/gi, "'")
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&');
}

/** Line breaks become newlines, every other tag is dropped. */
export function stripMarkup(html: string): string {
  const text = html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>\s*<p[^>]*>/gi, '\n')
    .replace(/<[^>]*>/g, '');
  return decodeEntities(text).trim();
}

export function truncate(text: string, maxLength: number = SUMMARY_MAX_LENGTH): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  return chars.slice(0, maxLength).join('') + TRUNCATION_MARKER;
}

export function buildSummary(html: string, maxLength: number = SUMMARY_MAX_LENGTH): string {
  return truncate(stripMarkup(html), maxLength);
}
