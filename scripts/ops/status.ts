/**
 * Store status report: totals, per-category counts and the latest items
 * Usage: npm run ops:status -- --category=CYBERSEC --limit=10
 */

import 'dotenv/config';
import { loadConfig } from '../../src/lib/config';
import { openStore } from '../../src/lib/db/store';
import { IngestionEngine } from '../../src/lib/services/ingestion-engine';

const argCategory = process.argv.find((a) => a.startsWith('--category='))?.split('=')[1];
const argLimit = process.argv.find((a) => a.startsWith('--limit='))?.split('=')[1];

function parseLimit(raw: string | undefined): number {
  if (raw === undefined) return 10;
  const limit = Number(raw);
  if (!Number.isInteger(limit)) {
    throw new Error(`--limit must be an integer, got "${raw}"`);
  }
  return limit;
}

async function main() {
  const limit = parseLimit(argLimit);
  const category = argCategory ? argCategory.toUpperCase() : null;

  const config = loadConfig();
  const store = await openStore(config.storeUrl);

  try {
    const engine = new IngestionEngine({ sources: config.sources, store });

    const [total, byCategory, latest] = await Promise.all([
      engine.totalCount(),
      engine.categoryCounts(),
      engine.latest(category, limit),
    ]);

    console.log('═══════════════════════════════════════════════════════');
    console.log('                  FEED INTEL STATUS                    ');
    console.log('═══════════════════════════════════════════════════════\n');

    console.log('📡 SOURCES');
    console.log(`   Configured: ${config.sources.length}`);
    console.log(`   Enabled:    ${config.sources.filter((s) => s.enabled).length}\n`);

    console.log('📰 STORED ITEMS');
    console.log(`   Total:      ${total}`);
    for (const [name, count] of Object.entries(byCategory)) {
      console.log(`   ${name.padEnd(12)}${count}`);
    }
    console.log('');

    console.log(`🕒 LATEST${category ? ` (${category})` : ''}`);
    if (latest.length === 0) {
      console.log('   No items yet. Run npm run ingest:once first.');
    }
    for (const item of latest) {
      const severity = item.severity ? ` (${item.severity})` : '';
      console.log(`   ${item.publishedAt.toISOString()} [${item.category}]${severity} ${item.title}`);
      if (item.url) console.log(`      ${item.url}`);
    }
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error('Status failed:', err);
  process.exit(1);
});
