import type { Severity } from '../db/models';

export const VULNERABILITY_ID_PATTERN = /\bCVE-\d{4}-\d{4,}\b/i;

// Checked in order, so "critical" beats "high" when both appear
const SEVERITY_KEYWORDS: ReadonlyArray<[Severity, RegExp]> = [
  ['CRITICAL', /\bcritical\b/i],
  ['HIGH', /\bhigh\b/i],
  ['MEDIUM', /\bmedium\b/i],
  ['LOW', /\blow\b/i],
];

export const DEFAULT_SEVERITY: Severity = 'MEDIUM';

export function containsVulnerabilityId(text: string): boolean {
  return VULNERABILITY_ID_PATTERN.test(text);
}

/**
 * Coarse severity for security items. Null unless title or text mentions a
 * CVE identifier; MEDIUM when it does but no keyword is present.
 */
export function detectSeverity(title: string, text: string): Severity | null {
  const haystack = `${title}\n${text}`;
  if (!containsVulnerabilityId(haystack)) return null;

  for (const [severity, pattern] of SEVERITY_KEYWORDS) {
    if (pattern.test(haystack)) return severity;
  }
  return DEFAULT_SEVERITY;
}
