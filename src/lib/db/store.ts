/**
 * Persistence contract for intelligence items
 * Every backend failure surfaces as StoreError tagged with the operation.
 */

import type { Category, IntelligenceItem } from './models';
import type { IngestLogger } from '../observability/logger';
import { StoreError, errorMessage } from '../errors';
import { createDbClient, ensureSchema } from './client';
import { SqliteIntelligenceStore } from './repositories/intelligence';
import { MemoryIntelligenceStore } from './repositories/memory-store';

export interface IntelligenceStore {
  /**
   * Insert-or-ignore keyed by content fingerprint, all or nothing.
   * Resolves to the number of records actually inserted.
   */
  insertBatch(items: readonly IntelligenceItem[]): Promise<number>;
  getById(id: string): Promise<IntelligenceItem | null>;
  /**
   * Newest first by publish time, ties in insertion order.
   * A null category means every category; limit <= 0 means no limit.
   */
  getLatest(category: Category | null, limit: number): Promise<IntelligenceItem[]>;
  count(category?: Category | null): Promise<number>;
  countByCategory(): Promise<Record<string, number>>;
  /** Delete items published before `now - maxAgeMs`; resolves to the number removed. */
  evictOlderThan(maxAgeMs: number, now?: Date): Promise<number>;
  close(): Promise<void>;
}

export const MEMORY_STORE_URL = 'memory';

/** `memory` selects the in-process store, anything else is a libsql URL. */
export async function openStore(storeUrl: string, logger?: IngestLogger): Promise<IntelligenceStore> {
  if (storeUrl === MEMORY_STORE_URL) {
    return new MemoryIntelligenceStore();
  }
  try {
    const client = createDbClient(storeUrl);
    try {
      await ensureSchema(client);
    } catch (error) {
      client.close();
      throw error;
    }
    return new SqliteIntelligenceStore(client, { logger });
  } catch (error) {
    throw new StoreError('open', `cannot open ${storeUrl}: ${errorMessage(error)}`, { cause: error });
  }
}
