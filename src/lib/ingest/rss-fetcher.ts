/**
 * RSS Fetcher
 * Fetches RSS/Atom feeds with a bounded timeout and normalizes the entries.
 * One attempt per call; retries belong to the next cycle.
 */

import Parser from 'rss-parser';
import type { FeedSource, IntelligenceItem } from '../db/models';
import { FetchError, ParseError, errorMessage } from '../errors';
import type { Fetcher, FetchOptions } from './fetcher';
import { normalizeEntries, type RawFeedEntry } from './normalizer';

// Fields rss-parser only exposes when asked for
type CustomItem = {
  id?: string;
  description?: string;
  updated?: string;
  'content:encoded'?: string;
};

type ParsedItem = CustomItem & Parser.Item;

export interface RSSFetcherOptions {
  userAgent?: string;
  defaultTimeoutMs?: number;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

function text(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function toRawEntry(item: ParsedItem): RawFeedEntry {
  return {
    nativeId: text(item.guid) ?? text(item.id),
    title: text(item.title),
    link: text(item.link),
    // RSS <description> or Atom <summary>
    description: text(item.description) ?? text(item.summary),
    // RSS <content:encoded> or Atom <content>
    content: text(item['content:encoded']) ?? text(item.content),
    published: text(item.isoDate) ?? text(item.pubDate),
    updated: text(item.updated),
  };
}

export class RSSFetcher implements Fetcher {
  private parser: Parser<Record<string, unknown>, CustomItem>;
  private userAgent: string;
  private defaultTimeoutMs: number;

  constructor(options: RSSFetcherOptions = {}) {
    this.parser = new Parser<Record<string, unknown>, CustomItem>({
      customFields: {
        item: ['id', 'description', 'updated'],
      },
    });
    this.userAgent = options.userAgent ?? 'FeedIntel/1.0';
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  async fetch(source: FeedSource, options: FetchOptions = {}): Promise<IntelligenceItem[]> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const xmlText = await this.download(source, timeout);
    const entries = await this.parse(source, xmlText);
    return normalizeEntries(source, entries, options.fetchedAt ?? new Date());
  }

  /**
   * Single GET with the timeout covering headers and body
   */
  private async download(source: FeedSource, timeout: number): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(source.url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(source.id, `HTTP ${response.status} from ${source.url}`, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (controller.signal.aborted) {
        throw new FetchError(source.id, `Timed out after ${timeout}ms fetching ${source.url}`, undefined, {
          cause: error,
        });
      }
      throw new FetchError(source.id, `Request to ${source.url} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async parse(source: FeedSource, xmlText: string): Promise<RawFeedEntry[]> {
    try {
      const feed = await this.parser.parseString(xmlText);
      return feed.items.map(toRawEntry);
    } catch (error) {
      throw new ParseError(source.id, `Failed to parse feed from ${source.url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export function createDefaultFetchers(options: RSSFetcherOptions = {}): Map<string, Fetcher> {
  return new Map<string, Fetcher>([['rss', new RSSFetcher(options)]]);
}
