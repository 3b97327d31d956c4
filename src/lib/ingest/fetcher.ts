import type { FeedSource, IntelligenceItem } from '../db/models';

export interface FetchOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
  /** Retrieval time stamped on every record; defaults to now */
  fetchedAt?: Date;
}

/**
 * Fetch-and-normalize capability for one fetch method.
 * Implementations hold no cross-call state and reject with FetchError or
 * ParseError, scoped to the source they were given.
 */
export interface Fetcher {
  fetch(source: FeedSource, options?: FetchOptions): Promise<IntelligenceItem[]>;
}

export type FetcherRegistry = ReadonlyMap<string, Fetcher>;
