const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'msclkid',
  'dclid',
  '_ga',
  '_gl',
  'mkt_tok',
  'ref',
  'ref_src',
]);

const TRACKING_PATTERNS: RegExp[] = [/^utm_/i, /^mc_/i, /^rss_/i, /^igshid$/i, /^twclid$/i];

function isTrackingParam(name: string): boolean {
  if (!name) return false;
  if (TRACKING_PARAMS.has(name.toLowerCase())) return true;
  return TRACKING_PATTERNS.some((p) => p.test(name));
}

/** Validate if URL is well-formed and safe (HTTP/S only). */
export function isValidUrl(url: string): boolean {
  if (!url || url.length > 2048) return false;
  try {
    const u = new URL(url);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Remove tracking params; the first occurrence of a repeated key wins. */
export function removeTrackingParams(url: string): string {
  try {
    const u = new URL(url);
    const seen = new Set<string>();
    const kept: [string, string][] = [];
    for (const [key, value] of u.searchParams.entries()) {
      const k = key.toLowerCase();
      if (isTrackingParam(key) || seen.has(k)) continue;
      seen.add(k);
      kept.push([key, value]);
    }
    u.search = '';
    for (const [k, v] of kept) u.searchParams.append(k, v);
    return u.toString();
  } catch {
    return url;
  }
}

/** Normalize: lowercase hostname, drop fragment, sort query params. */
export function normalizeUrl(url: string): string {
  try {
    const u = new URL(url);
    u.hostname = u.hostname.toLowerCase();
    u.hash = '';
    const sorted = Array.from(u.searchParams.entries()).sort((a, b) => a[0].localeCompare(b[0]));
    u.search = '';
    for (const [k, v] of sorted) u.searchParams.append(k, v);
    return u.toString();
  } catch {
    return url;
  }
}

/**
 * Canonical form of an entry link. IDN hosts come out as punycode through
 * WHATWG URL parsing. Anything that is not an http(s) URL is returned trimmed
 * but otherwise untouched.
 */
export function normalizeArticleUrl(url: string): string {
  const trimmed = url.trim();
  if (!isValidUrl(trimmed)) return trimmed;
  return normalizeUrl(removeTrackingParams(trimmed));
}
