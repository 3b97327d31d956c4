/**
 * Domain types for feed sources and ingested intelligence items
 * These mirror the `intelligence` table in schema.sql
 */

// ============================================
// Category
// ============================================

export const KNOWN_CATEGORIES = ['CYBERSEC', 'AITOOLS', 'OPENSOURCE', 'INFOSEC_NEWS'] as const;

export type KnownCategory = (typeof KNOWN_CATEGORIES)[number];

// Configuration may declare tags beyond the known set
export type Category = KnownCategory | (string & {});

export const DEFAULT_CATEGORY: KnownCategory = 'INFOSEC_NEWS';

// ============================================
// Feed Source
// ============================================

export type FetchMethod = 'rss';

export interface FeedSource {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly categories: readonly Category[];
  readonly fetchMethod: FetchMethod;
  readonly updateIntervalMin: number; // suggested refresh interval
  readonly enabled: boolean;
}

// ============================================
// Intelligence Item
// ============================================

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface IntelligenceItem {
  readonly id: string;
  readonly sourceId: string;
  readonly category: Category;
  readonly title: string;
  readonly url: string; // canonical
  readonly summary: string;
  readonly publishedAt: Date;
  readonly retrievedAt: Date;
  readonly contentHash: string; // dedup key
  readonly severity: Severity | null;
}
