/**
 * Long-running ingestion process
 * Usage: npm start
 */

import 'dotenv/config';
import { loadConfig } from '../src/lib/config';
import { openStore } from '../src/lib/db/store';
import { IngestionEngine } from '../src/lib/services/ingestion-engine';
import { logDebug, logError, logInfo, logWarn } from '../src/lib/observability/logger';

async function main() {
  const config = loadConfig();
  const store = await openStore(config.storeUrl);
  logDebug('Configuration loaded', {
    sources: config.sources.length,
    storeUrl: config.storeUrl,
    retentionDays: config.retentionDays,
  });

  const engine = new IngestionEngine({
    sources: config.sources,
    store,
    concurrency: config.maxConcurrentFetches,
    fetchTimeoutMs: config.fetchTimeoutMs,
    refreshCron: config.refreshCron,
    retentionDays: config.retentionDays,
  });

  // Signals belong to the process, the engine only knows stop()
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo('Shutdown requested', { signal });

    engine
      .stop()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError('Shutdown failed', err instanceof Error ? err : new Error(String(err)));
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const first = await engine.start();
  logInfo('Initial cycle finished', {
    itemsInserted: first.itemsInserted,
    sourcesFailed: first.sourcesFailed,
    nextRuns: config.refreshCron,
  });
  if (first.sourcesFailed > 0) {
    logWarn('Some sources failed on the first cycle', {
      failed: first.errors.flatMap((e) => (e.sourceId ? [e.sourceId] : [])),
    });
  }
}

main().catch((err) => {
  console.error('Engine failed to start:', err);
  process.exit(1);
});
