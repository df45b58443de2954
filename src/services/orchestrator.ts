/**
 * Collection Orchestrator
 *
 * Seeds the arena table once, then repeats stats ingestion, game backfill
 * and sun-time ingestion a fixed number of times with a pause between runs,
 * so that small capped batches add up across runs. A loop that throws is
 * recorded as an error outcome and does not stop the others.
 */

import { cfg, type SunTimesMode } from '../core/config.js';
import { logger } from '../core/logger.js';
import { withDatabase, type SqliteDb } from '../db/client.js';
import { toError } from '../errors/index.js';
import { sleep } from '../util/http.js';
import { seedArenasFromSource } from './arenaSeed.js';
import { defaultStatsOptions, ingestStats, type StatsIngestionOptions } from './statsIngestion.js';
import { backfillGameDetails, type BackfillOptions } from './gameBackfill.js';
import {
  defaultSunTimeOptions,
  ingestArenaSunTimes,
  ingestGameSunTimes,
  type SunTimeOptions
} from './sunTimeIngestion.js';
import type { StatsSource } from '../http/statsApiClient.js';
import type { SunTimeSource } from '../http/sunApiClient.js';
import type {
  LoopName,
  LoopOutcome,
  LoopSummary,
  RunReport,
  RunSummary,
  SeedOutcome
} from '../models/results.js';

export interface CollectionSources {
  stats: StatsSource;
  sun: SunTimeSource;
}

export interface CollectionOptions {
  dbPath: string;
  seedDbPath: string;
  totalRuns: number;
  runDelayMs: number;
  sunTimesMode: SunTimesMode;
  stats: StatsIngestionOptions;
  backfill: BackfillOptions;
  sunTimes: SunTimeOptions;
}

export function defaultCollectionOptions(): CollectionOptions {
  return {
    dbPath: cfg.database.path,
    seedDbPath: cfg.arenas.seedDbPath,
    totalRuns: cfg.collection.totalRuns,
    runDelayMs: cfg.collection.runDelayMs,
    sunTimesMode: cfg.collection.sunTimesMode,
    stats: defaultStatsOptions(),
    backfill: { cap: cfg.collection.backfillCap },
    sunTimes: defaultSunTimeOptions()
  };
}

/**
 * Runs one loop against its own store connection, turning any error into an outcome
 */
async function runLoop(
  loop: LoopName,
  dbPath: string,
  work: (db: SqliteDb) => Promise<LoopSummary>
): Promise<LoopOutcome> {
  try {
    const summary = await withDatabase(dbPath, work);
    return { loop, status: 'ok', summary };
  } catch (err) {
    logger.error({ err, loop }, 'Ingestion loop failed');
    return { loop, status: 'error', error: toError(err).message };
  }
}

async function seedArenas(options: CollectionOptions): Promise<SeedOutcome> {
  try {
    return await withDatabase(options.dbPath, async db => seedArenasFromSource(db, options.seedDbPath));
  } catch (err) {
    logger.error({ err }, 'Arena seeding failed');
    return { status: 'error', error: toError(err).message };
  }
}

/**
 * One collection run: stats, then game detail, then sun times
 */
export async function runSingleCollection(
  sources: CollectionSources,
  options: CollectionOptions
): Promise<LoopOutcome[]> {
  const outcomes: LoopOutcome[] = [];

  outcomes.push(await runLoop('stats', options.dbPath, db => ingestStats(db, sources.stats, options.stats)));
  outcomes.push(
    await runLoop('gameBackfill', options.dbPath, db => backfillGameDetails(db, sources.stats, options.backfill))
  );
  outcomes.push(
    options.sunTimesMode === 'arena'
      ? await runLoop('arenaSunTimes', options.dbPath, db => ingestArenaSunTimes(db, sources.sun, options.sunTimes))
      : await runLoop('gameSunTimes', options.dbPath, db => ingestGameSunTimes(db, sources.sun, options.sunTimes))
  );

  return outcomes;
}

function totalsOf(runs: RunReport[]): RunSummary['totals'] {
  const totals: RunSummary['totals'] = {
    stats: 0,
    gameBackfill: 0,
    arenaSunTimes: 0,
    gameSunTimes: 0,
    errors: 0
  };
  for (const run of runs) {
    for (const outcome of run.loops) {
      if (outcome.status === 'ok') {
        totals[outcome.loop] += outcome.summary.inserted;
      } else {
        totals.errors++;
      }
    }
  }
  return totals;
}

/**
 * Seeds arenas, then performs `totalRuns` collection runs
 */
export async function runCollection(
  sources: CollectionSources,
  options: CollectionOptions = defaultCollectionOptions()
): Promise<RunSummary> {
  const seed = await seedArenas(options);
  const runs: RunReport[] = [];

  for (let run = 1; run <= options.totalRuns; run++) {
    logger.info({ run, totalRuns: options.totalRuns }, 'Starting collection run');
    const loops = await runSingleCollection(sources, options);
    runs.push({ run, loops });

    if (run < options.totalRuns) {
      await sleep(options.runDelayMs);
    }
  }

  const summary: RunSummary = { seed, runs, totals: totalsOf(runs) };
  logger.info({ seed, totals: summary.totals }, 'Collection complete');
  return summary;
}
