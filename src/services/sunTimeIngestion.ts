/**
 * Sun-Time Ingestion Service
 *
 * Looks up sunrise/sunset for every arena (or every dated game) that has no
 * daylight row yet. Work is found by anti-join, fetched in capped batches,
 * paced with a fixed delay after each successful lookup and committed once
 * per batch.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { inTransaction, type SqliteDb } from '../db/client.js';
import {
  insertDaylightIfAbsent,
  insertGameDaylightIfAbsent,
  selectArenasMissingDaylight,
  selectGamesMissingDaylight,
  type ArenaCandidate,
  type GameCandidate
} from '../db/repositories/daylight.js';
import { summarize, type LoopName, type LoopSummary, type UnitResult } from '../models/results.js';
import { sleep } from '../util/http.js';
import type { SunTimeQuery, SunTimes, SunTimeSource } from '../http/sunApiClient.js';
import type { UpsertOutcome } from '../db/types.js';

export interface SunTimeOptions {
  /** Maximum rows written per invocation */
  cap: number;
  /** Candidates selected per inner batch */
  batchSize: number;
  /** Pause after each successful API call */
  delayMs: number;
}

export function defaultSunTimeOptions(): SunTimeOptions {
  return {
    cap: cfg.collection.sunTimesCap,
    batchSize: cfg.collection.sunTimesBatchSize,
    delayMs: cfg.collection.sunTimesDelayMs
  };
}

/**
 * How one daylight variant finds, queries and stores its keys
 */
interface SunTimeVariant<C> {
  loop: LoopName;
  select(db: SqliteDb, limit: number, exclude: number[]): C[];
  key(candidate: C): number;
  query(candidate: C): SunTimeQuery;
  store(db: SqliteDb, candidate: C, times: SunTimes): UpsertOutcome;
}

const arenaVariant: SunTimeVariant<ArenaCandidate> = {
  loop: 'arenaSunTimes',
  select: selectArenasMissingDaylight,
  key: arena => arena.id,
  query: arena => ({ latitude: arena.latitude, longitude: arena.longitude }),
  store: (db, arena, times) =>
    insertDaylightIfAbsent(db, { arena_id: arena.id, sunrise: times.sunrise, sunset: times.sunset })
};

const gameVariant: SunTimeVariant<GameCandidate> = {
  loop: 'gameSunTimes',
  select: selectGamesMissingDaylight,
  key: game => game.game_id,
  query: game => ({ latitude: game.latitude, longitude: game.longitude, date: game.date }),
  store: (db, game, times) => insertGameDaylightIfAbsent(db, { ...game, sunrise: times.sunrise, sunset: times.sunset })
};

async function ingestSunTimes<C>(
  db: SqliteDb,
  source: SunTimeSource,
  variant: SunTimeVariant<C>,
  options: SunTimeOptions
): Promise<LoopSummary> {
  const results: UnitResult[] = [];
  // Keys already attempted in this invocation are not selected again until the next one
  const attemptedKeys: number[] = [];
  let processed = 0;

  while (processed < options.cap) {
    const limit = Math.min(options.batchSize, options.cap - processed);
    const batch = variant.select(db, limit, attemptedKeys);
    if (batch.length === 0) {
      logger.info({ loop: variant.loop }, 'All daylight keys processed');
      break;
    }

    await inTransaction(db, async () => {
      for (const candidate of batch) {
        const key = variant.key(candidate);
        try {
          const times = await source.fetchSunTimes(variant.query(candidate));
          const outcome = variant.store(db, candidate, times);
          if (outcome === 'inserted') {
            processed++;
            results.push({ status: 'inserted', key });
            logger.debug({ loop: variant.loop, key }, 'Stored daylight info');
          } else {
            attemptedKeys.push(key);
            results.push({ status: 'duplicate', key });
          }
          await sleep(options.delayMs);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          logger.warn({ loop: variant.loop, key, reason }, 'Error processing daylight key');
          attemptedKeys.push(key);
          results.push({ status: 'failed', key, reason });
        }
      }
    });
  }

  const summary = summarize(variant.loop, results);
  logger.info(
    { loop: variant.loop, inserted: summary.inserted, failed: summary.failures.length },
    'Sun-time ingestion finished'
  );
  return summary;
}

/**
 * Per-arena variant: one daylight_info row per arena (today's times)
 */
export function ingestArenaSunTimes(
  db: SqliteDb,
  source: SunTimeSource,
  options: SunTimeOptions = defaultSunTimeOptions()
): Promise<LoopSummary> {
  return ingestSunTimes(db, source, arenaVariant, options);
}

/**
 * Per-game variant: one game_daylight_info row per dated game, at its home arena on game day
 */
export function ingestGameSunTimes(
  db: SqliteDb,
  source: SunTimeSource,
  options: SunTimeOptions = defaultSunTimeOptions()
): Promise<LoopSummary> {
  return ingestSunTimes(db, source, gameVariant, options);
}
