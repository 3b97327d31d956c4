import type { Client, InStatement, Row } from '@libsql/client';
import { SEVERITIES, type Category, type IntelligenceItem, type Severity } from '../models';
import type { IntelligenceStore } from '../store';
import { StoreError, errorMessage } from '../../errors';
import { appLogger, type IngestLogger } from '../../observability/logger';

export interface SqliteStoreOptions {
  logger?: IngestLogger;
}

const COLUMNS =
  'id, source_id, category, title, url, summary, published_at, retrieved_at, content_hash, severity';

// No conflict target: a duplicate id or content_hash is skipped, CHECK failures still abort
const INSERT_SQL = `INSERT INTO intelligence (${COLUMNS})
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT DO NOTHING`;

function asString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`column ${column} is not text`);
  }
  return value;
}

function asNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new Error(`column ${column} is not numeric`);
}

function asSeverity(row: Row): Severity | null {
  const value = row.severity;
  return SEVERITIES.find((severity) => severity === value) ?? null;
}

export function rowToItem(row: Row): IntelligenceItem {
  return {
    id: asString(row, 'id'),
    sourceId: asString(row, 'source_id'),
    category: asString(row, 'category'),
    title: asString(row, 'title'),
    url: asString(row, 'url'),
    summary: asString(row, 'summary'),
    publishedAt: new Date(asNumber(row, 'published_at')),
    retrievedAt: new Date(asNumber(row, 'retrieved_at')),
    contentHash: asString(row, 'content_hash'),
    severity: asSeverity(row),
  };
}

function insertStatement(item: IntelligenceItem): InStatement {
  return {
    sql: INSERT_SQL,
    args: [
      item.id,
      item.sourceId,
      item.category,
      item.title,
      item.url,
      item.summary,
      item.publishedAt.getTime(),
      item.retrievedAt.getTime(),
      item.contentHash,
      item.severity,
    ],
  };
}

/**
 * SQLite-backed store over @libsql/client.
 * Fingerprint uniqueness comes from the unique index, so racing writers
 * cannot both insert the same item.
 */
export class SqliteIntelligenceStore implements IntelligenceStore {
  private readonly logger: IngestLogger;

  constructor(private readonly client: Client, options: SqliteStoreOptions = {}) {
    this.logger = options.logger ?? appLogger;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(operation, errorMessage(error), { cause: error });
    }
  }

  async insertBatch(items: readonly IntelligenceItem[]): Promise<number> {
    if (items.length === 0) return 0;

    return this.run('insertBatch', async () => {
      // batch() runs every statement in one transaction and rolls back on failure
      const results = await this.client.batch(items.map(insertStatement), 'write');
      const inserted = results.reduce((sum, result) => sum + result.rowsAffected, 0);
      this.logger.debug('Stored intelligence batch', {
        received: items.length,
        inserted,
        duplicates: items.length - inserted,
      });
      return inserted;
    });
  }

  async getById(id: string): Promise<IntelligenceItem | null> {
    return this.run('getById', async () => {
      const result = await this.client.execute({
        sql: `SELECT ${COLUMNS} FROM intelligence WHERE id = ?`,
        args: [id],
      });
      return result.rows.length > 0 ? rowToItem(result.rows[0]) : null;
    });
  }

  async getLatest(category: Category | null, limit: number): Promise<IntelligenceItem[]> {
    return this.run('getLatest', async () => {
      const where = category !== null ? 'WHERE category = ?' : '';
      const bounded = limit > 0 ? 'LIMIT ?' : '';
      const args: (string | number)[] = [];
      if (category !== null) args.push(category);
      if (limit > 0) args.push(Math.floor(limit));

      const result = await this.client.execute({
        sql: `SELECT ${COLUMNS} FROM intelligence ${where}
          ORDER BY published_at DESC, rowid ASC ${bounded}`,
        args,
      });
      return result.rows.map(rowToItem);
    });
  }

  async count(category: Category | null = null): Promise<number> {
    return this.run('count', async () => {
      const result =
        category !== null
          ? await this.client.execute({
              sql: 'SELECT COUNT(*) AS total FROM intelligence WHERE category = ?',
              args: [category],
            })
          : await this.client.execute('SELECT COUNT(*) AS total FROM intelligence');
      return asNumber(result.rows[0], 'total');
    });
  }

  async countByCategory(): Promise<Record<string, number>> {
    return this.run('countByCategory', async () => {
      const result = await this.client.execute(
        'SELECT category, COUNT(*) AS total FROM intelligence GROUP BY category ORDER BY category'
      );
      const counts: Record<string, number> = {};
      for (const row of result.rows) {
        counts[asString(row, 'category')] = asNumber(row, 'total');
      }
      return counts;
    });
  }

  async evictOlderThan(maxAgeMs: number, now: Date = new Date()): Promise<number> {
    return this.run('evictOlderThan', async () => {
      const cutoff = now.getTime() - maxAgeMs;
      const result = await this.client.execute({
        sql: 'DELETE FROM intelligence WHERE published_at < ?',
        args: [cutoff],
      });
      return result.rowsAffected;
    });
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
