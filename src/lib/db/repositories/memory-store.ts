import { SEVERITIES, type Category, type IntelligenceItem } from '../models';
import type { IntelligenceStore } from '../store';
import { StoreError } from '../../errors';

interface StoredItem {
  item: IntelligenceItem;
  seq: number; // insertion order, breaks publish-time ties
}

function newestFirst(a: StoredItem, b: StoredItem): number {
  return b.item.publishedAt.getTime() - a.item.publishedAt.getTime() || a.seq - b.seq;
}

function rejectInvalid(item: IntelligenceItem, index: number): void {
  if (!item.id) throw new StoreError('insertBatch', `record ${index} has an empty id`);
  if (!item.contentHash) throw new StoreError('insertBatch', `record ${index} has an empty content hash`);
  if (!item.title) throw new StoreError('insertBatch', `record ${index} has an empty title`);
  if (Number.isNaN(item.publishedAt.getTime())) {
    throw new StoreError('insertBatch', `record ${index} has an invalid publish date`);
  }
  if (item.severity !== null && !SEVERITIES.includes(item.severity)) {
    throw new StoreError('insertBatch', `record ${index} has an unknown severity "${item.severity}"`);
  }
}

// Dates are mutable, so the store keeps its own and hands out copies
function copyItem(item: IntelligenceItem): IntelligenceItem {
  return {
    ...item,
    publishedAt: new Date(item.publishedAt.getTime()),
    retrievedAt: new Date(item.retrievedAt.getTime()),
  };
}

/**
 * In-process store: records keyed by id, with fingerprint and category
 * indices. Used by tests and STORE_URL=memory.
 */
export class MemoryIntelligenceStore implements IntelligenceStore {
  private readonly byId = new Map<string, StoredItem>();
  private readonly idByHash = new Map<string, string>();
  private readonly idsByCategory = new Map<Category, Set<string>>();
  private nextSeq = 0;
  private closed = false;

  private ensureOpen(operation: string): void {
    if (this.closed) throw new StoreError(operation, 'store is closed');
  }

  async insertBatch(items: readonly IntelligenceItem[]): Promise<number> {
    this.ensureOpen('insertBatch');
    // validate everything first so a rejected batch leaves no trace
    items.forEach(rejectInvalid);

    let inserted = 0;
    for (const item of items) {
      if (this.idByHash.has(item.contentHash) || this.byId.has(item.id)) continue;

      this.byId.set(item.id, { item: Object.freeze(copyItem(item)), seq: this.nextSeq++ });
      this.idByHash.set(item.contentHash, item.id);
      let ids = this.idsByCategory.get(item.category);
      if (!ids) {
        ids = new Set();
        this.idsByCategory.set(item.category, ids);
      }
      ids.add(item.id);
      inserted++;
    }
    return inserted;
  }

  async getById(id: string): Promise<IntelligenceItem | null> {
    this.ensureOpen('getById');
    const stored = this.byId.get(id);
    return stored ? copyItem(stored.item) : null;
  }

  private select(category: Category | null): StoredItem[] {
    if (category === null) return Array.from(this.byId.values());
    const ids = this.idsByCategory.get(category) ?? new Set<string>();
    const selected: StoredItem[] = [];
    for (const id of ids) {
      const stored = this.byId.get(id);
      if (stored) selected.push(stored);
    }
    return selected;
  }

  async getLatest(category: Category | null, limit: number): Promise<IntelligenceItem[]> {
    this.ensureOpen('getLatest');
    const ordered = this.select(category).sort(newestFirst);
    const bounded = limit > 0 ? ordered.slice(0, Math.floor(limit)) : ordered;
    return bounded.map((stored) => copyItem(stored.item));
  }

  async count(category: Category | null = null): Promise<number> {
    this.ensureOpen('count');
    if (category === null) return this.byId.size;
    return this.idsByCategory.get(category)?.size ?? 0;
  }

  async countByCategory(): Promise<Record<string, number>> {
    this.ensureOpen('countByCategory');
    const counts: Record<string, number> = {};
    for (const category of Array.from(this.idsByCategory.keys()).sort()) {
      const size = this.idsByCategory.get(category)?.size ?? 0;
      if (size > 0) counts[category] = size;
    }
    return counts;
  }

  async evictOlderThan(maxAgeMs: number, now: Date = new Date()): Promise<number> {
    this.ensureOpen('evictOlderThan');
    const cutoff = now.getTime() - maxAgeMs;
    let evicted = 0;
    for (const [id, { item }] of this.byId) {
      if (item.publishedAt.getTime() >= cutoff) continue;
      this.byId.delete(id);
      this.idByHash.delete(item.contentHash);
      this.idsByCategory.get(item.category)?.delete(id);
      evicted++;
    }
    return evicted;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
