/**
 * Ingestion Engine
 * Runs periodic refresh cycles: fetch every enabled source through a bounded
 * worker pool, write the combined result as one batch, then evict expired items.
 */

import cron, { type ScheduledTask } from 'node-cron';
import pLimit from 'p-limit';
import type { Category, FeedSource, IntelligenceItem } from '../db/models';
import type { IntelligenceStore } from '../db/store';
import type { FetcherRegistry } from '../ingest/fetcher';
import { createDefaultFetchers, DEFAULT_FETCH_TIMEOUT_MS } from '../ingest/rss-fetcher';
import {
  ConcurrencyError,
  ConfigError,
  FetchError,
  IngestError,
  StoreError,
  errorMessage,
  type IngestErrorKind,
} from '../errors';
import { appLogger, guardLogger, withCorrelationId, type IngestLogger } from '../observability/logger';
import { SourceHealthTracker, type HealthMetrics } from './source-health';

export type EngineState = 'stopped' | 'running';

/** What started a cycle */
export type CycleTrigger = 'start' | 'schedule' | 'manual';

export interface CycleError {
  /** null for store-level failures */
  sourceId: string | null;
  kind: IngestErrorKind | 'unknown';
  message: string;
}

export interface CycleSummary {
  cycle: number;
  trigger: CycleTrigger;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  sourcesProcessed: number;
  sourcesFailed: number;
  itemsFetched: number;
  itemsInserted: number;
  itemsDuplicate: number;
  /** Fetched items already past the retention window, never written */
  itemsExpired: number;
  itemsEvicted: number;
  errors: CycleError[];
}

export interface EngineStatus {
  state: EngineState;
  cycleInFlight: boolean;
  cyclesCompleted: number;
  sourcesConfigured: number;
  sourcesEnabled: number;
  refreshCron: string;
  degradedSources: string[];
  lastCycle: CycleSummary | null;
}

export interface IngestionEngineOptions {
  sources: readonly FeedSource[];
  store: IntelligenceStore;
  fetchers?: FetcherRegistry;
  /** Maximum concurrent source fetches per cycle */
  concurrency?: number;
  fetchTimeoutMs?: number;
  refreshCron?: string;
  retentionDays?: number;
  logger?: IngestLogger;
}

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_REFRESH_CRON = '*/5 * * * *';
export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_LATEST_LIMIT = 20;

const DAY_MS = 24 * 60 * 60 * 1000;

type SourceOutcome =
  | { ok: true; source: FeedSource; items: IntelligenceItem[] }
  | { ok: false; source: FeedSource; error: unknown };

function toCycleError(sourceId: string | null, error: unknown): CycleError {
  return {
    sourceId,
    kind: error instanceof IngestError ? error.kind : 'unknown',
    message: errorMessage(error),
  };
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class IngestionEngine {
  private readonly sources: readonly FeedSource[];
  private readonly store: IntelligenceStore;
  private readonly fetchers: FetcherRegistry;
  private readonly concurrency: number;
  private readonly fetchTimeoutMs: number;
  private readonly refreshCron: string;
  private readonly retentionMs: number;
  private readonly injectedLogger: IngestLogger | null;
  private readonly logger: IngestLogger;
  private readonly health = new SourceHealthTracker();

  private task: ScheduledTask | null = null;
  private inFlight: Promise<CycleSummary> | null = null;
  private cycleCounter = 0;
  private cyclesCompleted = 0;
  private lastCycle: CycleSummary | null = null;

  constructor(options: IngestionEngineOptions) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    const refreshCron = options.refreshCron ?? DEFAULT_REFRESH_CRON;
    if (!cron.validate(refreshCron)) {
      throw new ConfigError(`invalid refresh cron expression "${refreshCron}"`);
    }

    this.sources = options.sources;
    this.store = options.store;
    this.fetchers = options.fetchers ?? createDefaultFetchers();
    this.concurrency = concurrency;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.refreshCron = refreshCron;
    this.retentionMs = (options.retentionDays ?? DEFAULT_RETENTION_DAYS) * DAY_MS;
    this.injectedLogger = options.logger ? guardLogger(options.logger) : null;
    this.logger = this.injectedLogger ?? guardLogger(appLogger);
  }

  get state(): EngineState {
    return this.task ? 'running' : 'stopped';
  }

  /**
   * Schedule periodic cycles and run the first one immediately.
   * Resolves with the first cycle's summary.
   */
  async start(): Promise<CycleSummary> {
    if (this.task) {
      throw new ConcurrencyError('Ingestion engine is already running');
    }

    this.task = cron.schedule(this.refreshCron, () => this.onTick());
    this.logger.info('Ingestion engine started', {
      refreshCron: this.refreshCron,
      concurrency: this.concurrency,
      sources: this.sources.length,
    });

    return this.runCycle('start');
  }

  /**
   * Stop the schedule and wait for the in-flight cycle to finish.
   * No-op when already stopped.
   */
  async stop(): Promise<void> {
    const task = this.task;
    if (!task) return;

    task.stop();
    this.task = null;

    if (this.inFlight) {
      this.logger.info('Waiting for in-flight cycle to drain');
      await this.inFlight;
    }
    this.logger.info('Ingestion engine stopped', { cyclesCompleted: this.cyclesCompleted });
  }

  /**
   * Out-of-band cycle. Joins the running cycle instead of starting a second one.
   */
  refreshNow(): Promise<CycleSummary> {
    return this.runCycle('manual');
  }

  async latest(
    category: Category | null = null,
    limit: number = DEFAULT_LATEST_LIMIT
  ): Promise<IntelligenceItem[]> {
    return this.query<IntelligenceItem[]>('getLatest', [], () =>
      this.store.getLatest(category, limit)
    );
  }

  async byId(id: string): Promise<IntelligenceItem | null> {
    return this.query('getById', null, () => this.store.getById(id));
  }

  async totalCount(): Promise<number> {
    return this.query('count', 0, () => this.store.count());
  }

  async categoryCounts(): Promise<Record<string, number>> {
    return this.query<Record<string, number>>('countByCategory', {}, () =>
      this.store.countByCategory()
    );
  }

  status(): EngineStatus {
    return {
      state: this.state,
      cycleInFlight: this.inFlight !== null,
      cyclesCompleted: this.cyclesCompleted,
      sourcesConfigured: this.sources.length,
      sourcesEnabled: this.sources.filter((s) => s.enabled).length,
      refreshCron: this.refreshCron,
      degradedSources: this.health.getDegradedSources().map((m) => m.sourceId),
      lastCycle: this.lastCycle,
    };
  }

  sourceHealth(): HealthMetrics[] {
    return this.health.snapshot();
  }

  private onTick(): void {
    if (!this.task) return;
    this.runCycle('schedule').catch((error: unknown) => {
      this.logger.error('Scheduled ingestion cycle failed', asError(error));
    });
  }

  private runCycle(trigger: CycleTrigger): Promise<CycleSummary> {
    if (this.inFlight) {
      this.logger.debug('Cycle already in flight, joining it', { trigger });
      return this.inFlight;
    }

    const cycle = this.executeCycle(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async query<T>(operation: string, fallback: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;
      this.logger.error('Store read failed', error, { operation });
      return fallback;
    }
  }

  private async fetchSource(source: FeedSource, log: IngestLogger): Promise<SourceOutcome> {
    try {
      const fetcher = this.fetchers.get(source.fetchMethod);
      if (!fetcher) {
        throw new FetchError(source.id, `No fetcher registered for fetch method "${source.fetchMethod}"`);
      }
      const items = await fetcher.fetch(source, { timeoutMs: this.fetchTimeoutMs });
      log.debug('Source fetched', { sourceId: source.id, items: items.length });
      return { ok: true, source, items };
    } catch (error) {
      log.error('Source fetch failed', asError(error), { sourceId: source.id, url: source.url });
      return { ok: false, source, error };
    }
  }

  private async executeCycle(trigger: CycleTrigger): Promise<CycleSummary> {
    const cycle = ++this.cycleCounter;
    const log = this.injectedLogger ?? guardLogger(withCorrelationId(`cycle-${cycle}`));
    const startedAt = new Date();
    const enabled = this.sources.filter((source) => source.enabled);

    log.info('Ingestion cycle started', { cycle, trigger, sources: enabled.length });

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(enabled.map((source) => limit(() => this.fetchSource(source, log))));

    // Aggregate: source-level failures stop here
    const errors: CycleError[] = [];
    const items: IntelligenceItem[] = [];
    let sourcesFailed = 0;
    for (const outcome of outcomes) {
      if (outcome.ok) {
        items.push(...outcome.items);
        this.health.trackSuccess(outcome.source.id);
      } else {
        sourcesFailed++;
        errors.push(toCycleError(outcome.source.id, outcome.error));
        this.health.trackFailure(outcome.source.id, errorMessage(outcome.error));
      }
    }

    // Items the eviction pass would drop straight away are never written,
    // otherwise their fingerprint is freed and they come back every cycle.
    const cutoff = Date.now() - this.retentionMs;
    const fresh = items.filter((item) => item.publishedAt.getTime() >= cutoff);
    const itemsExpired = items.length - fresh.length;
    if (itemsExpired > 0) {
      log.debug('Skipped items past retention', { expired: itemsExpired });
    }

    let itemsInserted = 0;
    let itemsDuplicate = 0;
    if (fresh.length > 0) {
      try {
        itemsInserted = await this.store.insertBatch(fresh);
        itemsDuplicate = fresh.length - itemsInserted;
      } catch (error) {
        log.error('Batch write failed, cycle items not ingested', asError(error), { items: fresh.length });
        errors.push(toCycleError(null, error));
      }
    }

    let itemsEvicted = 0;
    try {
      itemsEvicted = await this.store.evictOlderThan(this.retentionMs);
      if (itemsEvicted > 0) {
        log.info('Evicted expired items', { evicted: itemsEvicted });
      }
    } catch (error) {
      log.error('Eviction failed', asError(error));
      errors.push(toCycleError(null, error));
    }

    const finishedAt = new Date();
    const summary: CycleSummary = {
      cycle,
      trigger,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      sourcesProcessed: enabled.length,
      sourcesFailed,
      itemsFetched: items.length,
      itemsInserted,
      itemsDuplicate,
      itemsExpired,
      itemsEvicted,
      errors,
    };

    this.cyclesCompleted++;
    this.lastCycle = summary;

    log.info('Ingestion cycle completed', {
      cycle,
      durationMs: summary.durationMs,
      sourcesProcessed: summary.sourcesProcessed,
      sourcesFailed,
      itemsFetched: summary.itemsFetched,
      itemsInserted,
      itemsDuplicate,
      itemsExpired,
      itemsEvicted,
    });

    return summary;
  }
}
