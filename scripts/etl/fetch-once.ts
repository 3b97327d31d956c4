/**
 * Run a single ingestion cycle and exit
 * Usage: npm run ingest:once
 */

import 'dotenv/config';
import { loadConfig } from '../../src/lib/config';
import { openStore } from '../../src/lib/db/store';
import { IngestionEngine } from '../../src/lib/services/ingestion-engine';

async function main() {
  const config = loadConfig();
  const store = await openStore(config.storeUrl);

  try {
    const engine = new IngestionEngine({
      sources: config.sources,
      store,
      concurrency: config.maxConcurrentFetches,
      fetchTimeoutMs: config.fetchTimeoutMs,
      refreshCron: config.refreshCron,
      retentionDays: config.retentionDays,
    });

    const enabled = config.sources.filter((s) => s.enabled).length;
    console.log(`📰 Ingesting from ${enabled} sources...`);

    const summary = await engine.refreshNow();

    for (const error of summary.errors) {
      console.error(`✗ ${error.sourceId ?? 'store'} [${error.kind}]: ${error.message}`);
    }
    console.log(
      `✅ Done in ${summary.durationMs}ms. fetched=${summary.itemsFetched}, inserted=${summary.itemsInserted}, ` +
        `duplicates=${summary.itemsDuplicate}, expired=${summary.itemsExpired}, evicted=${summary.itemsEvicted}, failedSources=${summary.sourcesFailed}`
    );
    console.log(`   Total stored: ${await engine.totalCount()}`);
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error('Ingest failed:', err);
  process.exit(1);
});
