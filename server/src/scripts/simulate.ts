// server/src/scripts/simulate.ts
// Usage:
//   tsx server/src/scripts/simulate.ts --home=12 --away=7 --season=2024 --date=2025-02-01
//     [--iterations=10000] [--seed=42] [--disable=synergy,momentum] [--data=./csv] [--json]
// Without --data the database configured in .env is used. Progress and timing
// go to stderr; stdout carries only the result.

import { loadEngineConfig } from '../simulation/config.js';
import { isSimulationError } from '../simulation/errors.js';
import { SIM_SEGMENTS } from '../simulation/types.js';
import type { SimulationFeatures } from '../simulation/types.js';
import { calendarDate, parseSimulationConfig } from '../simulation/simulationConfig.js';
import { loadCsvDataset } from '../services/csvData.js';
import type { HistoricalDataSource } from '../services/dataSource.js';
import { MemoryDataSource } from '../services/memoryDataSource.js';
import { renderRunReport, simulateMatchup } from '../services/simulation.js';

const FEATURES: ReadonlyArray<keyof SimulationFeatures> = ['synergy', 'clutch', 'fatigue', 'momentum', 'segmentWeights'];

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const [k, ...rest] = arg.slice(2).split('=');
    out[k] = rest.length > 0 ? rest.join('=') : 'true';
  }
  return out;
}

function numberArg(args: Record<string, string>, key: string): number | undefined {
  return args[key] === undefined ? undefined : Number(args[key]);
}

function buildRawConfig(args: Record<string, string>) {
  const disabled = new Set((args.disable ?? '').split(',').map(s => s.trim()).filter(Boolean));
  for (const name of disabled) {
    if (!FEATURES.some(f => f === name)) throw new Error(`Unknown feature "${name}" (known: ${FEATURES.join(', ')})`);
  }
  const features: Partial<SimulationFeatures> = {};
  for (const f of FEATURES) features[f] = !disabled.has(f);

  const weights: Record<string, number> = {};
  for (const segment of SIM_SEGMENTS) {
    const value = numberArg(args, `weight-${segment}`);
    if (value !== undefined) weights[segment] = value;
  }

  return {
    homeTeamId: numberArg(args, 'home'),
    awayTeamId: numberArg(args, 'away'),
    iterationCount: numberArg(args, 'iterations'),
    randomSeed: numberArg(args, 'seed'),
    features,
    segmentWeights: weights
  };
}

async function openSource(dataDir: string | undefined): Promise<{ source: HistoricalDataSource; close: () => Promise<void> }> {
  if (dataDir) {
    console.error(`Loading CSV export from ${dataDir}`);
    return { source: new MemoryDataSource(loadCsvDataset(dataDir)), close: async () => {} };
  }
  // loaded lazily so --data runs never open a database connection
  const [{ SequelizeDataSource }, { sequelize }] = await Promise.all([
    import('../services/sequelizeDataSource.js'),
    import('../db.js')
  ]);
  return { source: new SequelizeDataSource(), close: () => sequelize.close() };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const season = Number(args.season);
  const date = args.date ?? '';
  if (!Number.isInteger(season) || !calendarDate.safeParse(date).success) {
    throw new Error('Missing required --season=<year> and --date=<YYYY-MM-DD>');
  }

  const config = parseSimulationConfig(buildRawConfig(args));
  const engineConfig = loadEngineConfig();
  const { source, close } = await openSource(args.data);

  try {
    const started = Date.now();
    let reported = 0;
    const result = await simulateMatchup(source, { season, date, config }, engineConfig, {
      onProgress: (completed, total) => {
        const pct = Math.floor((completed / total) * 10);
        if (pct > reported) {
          reported = pct;
          process.stderr.write(`  ${completed}/${total} trials\n`);
        }
      }
    });
    const elapsedMs = Date.now() - started;
    const [home, away] = await Promise.all([source.getTeam(config.homeTeamId), source.getTeam(config.awayTeamId)]);
    const report = renderRunReport(result, {
      json: args.json === 'true',
      elapsedMs,
      homeName: home?.name,
      awayName: away?.name
    });
    console.error(report.stderr);
    console.log(report.stdout);
  } finally {
    await close();
  }
}

main().catch(error => {
  if (isSimulationError(error)) {
    console.error(`${error.message}`);
    for (const [key, value] of Object.entries(error.details)) {
      if (value !== undefined) console.error(`  ${key}: ${Array.isArray(value) ? value.join('; ') : value}`);
    }
  } else {
    console.error('Simulation failed:', error);
  }
  process.exitCode = 1;
});
