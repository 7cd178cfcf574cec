// server/src/scripts/import-csv.ts
// Usage: tsx server/src/scripts/import-csv.ts [csvDir]   (defaults to $CSV_DIR or ./csv)
// With API_URL set, a running server is told to drop its cached profiles
// for every imported season.

import path from 'path';
import { sequelize } from '../db.js';
import { syncModels } from '../models/index.js';
import { loadCsvDataset } from '../services/csvData.js';
import { ingestDataset } from '../services/ingest.js';

const CSV_DIR = path.resolve(process.argv[2] ?? process.env.CSV_DIR ?? 'csv');
const API_URL = process.env.API_URL;

async function invalidateServerCache(seasons: number[]) {
  if (!API_URL) {
    console.log('API_URL not set: restart running servers or POST /api/cache/invalidate to refresh them.');
    return;
  }
  for (const season of seasons) {
    const response = await fetch(`${API_URL}/api/cache/invalidate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ season })
    });
    if (!response.ok) {
      console.warn(`Cache invalidation for season ${season} returned ${response.status}`);
      continue;
    }
    const body: unknown = await response.json();
    const removed = typeof body === 'object' && body !== null && 'removed' in body ? body.removed : '?';
    console.log(`Server dropped ${removed} cached profiles for season ${season}`);
  }
}

async function main() {
  try {
    console.log(`Importing CSV export from ${CSV_DIR}`);
    console.log('==========================================\n');

    await syncModels();
    console.log('Database synced\n');

    const dataset = loadCsvDataset(CSV_DIR);
    const { counts, seasons } = await ingestDataset(dataset);

    console.log('\n==========================================');
    console.log('Import completed');
    for (const [table, count] of Object.entries(counts)) console.log(`  ${table}: ${count}`);
    console.log(`Seasons touched: ${seasons.length > 0 ? seasons.join(', ') : 'none'}`);
    console.log('==========================================');

    await invalidateServerCache(seasons);
  } catch (error) {
    console.error('Import failed:', error);
    process.exitCode = 1;
  } finally {
    await sequelize.close();
  }
}

main();
