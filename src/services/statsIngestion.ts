/**
 * Stats Ingestion Service
 *
 * Pages through the stats API for the tracked players and seasons and
 * stores players, game stubs and stat lines. Stops at the per-invocation
 * cap of new stat rows or when the API has no further pages.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { inTransaction, type SqliteDb } from '../db/client.js';
import { upsertPlayer } from '../db/repositories/players.js';
import { upsertGameStub } from '../db/repositories/games.js';
import { insertStatIfAbsent } from '../db/repositories/gameStats.js';
import { summarize, type LoopSummary, type UnitResult } from '../models/results.js';
import type { StatsQuery, StatsSource } from '../http/statsApiClient.js';
import type { StatRecord } from '../types/api.js';

export interface StatsIngestionOptions {
  playerIds: number[];
  seasons: number[];
  perPage: number;
  /** Maximum new stat rows per invocation */
  cap: number;
}

export function defaultStatsOptions(): StatsIngestionOptions {
  return {
    playerIds: cfg.statsApi.playerIds,
    seasons: cfg.statsApi.seasons,
    perPage: cfg.statsApi.perPage,
    cap: cfg.collection.statsCap
  };
}

/**
 * Stores the player, the game stub and the stat line of one record
 */
export function storeStatRecord(db: SqliteDb, record: StatRecord): UnitResult {
  upsertPlayer(db, {
    player_id: record.player.id,
    first_name: record.player.first_name,
    last_name: record.player.last_name,
    position: record.player.position,
    team_id: record.team.id
  });
  upsertGameStub(db, record.game.id);

  const outcome = insertStatIfAbsent(db, {
    stat_id: record.id,
    player_id: record.player.id,
    game_id: record.game.id,
    pts: record.pts,
    reb: record.reb,
    ast: record.ast
  });
  return outcome === 'inserted'
    ? { status: 'inserted', key: record.id }
    : { status: 'duplicate', key: record.id };
}

/**
 * Runs one stats ingestion invocation
 *
 * All writes are committed together at the end; an error rolls back the whole invocation.
 * When the cap is hit mid-page the rest of that page is left for a later invocation.
 */
export async function ingestStats(
  db: SqliteDb,
  source: StatsSource,
  options: StatsIngestionOptions = defaultStatsOptions()
): Promise<LoopSummary> {
  const results: UnitResult[] = [];
  let inserted = 0;
  let pages = 0;

  await inTransaction(db, async () => {
    let cursor: StatsQuery['cursor'] = null;

    while (inserted < options.cap) {
      const page = await source.fetchStatsPage({
        playerIds: options.playerIds,
        seasons: options.seasons,
        perPage: options.perPage,
        cursor
      });
      pages++;

      for (const record of page.data) {
        const result = storeStatRecord(db, record);
        results.push(result);
        if (result.status === 'inserted') inserted++;
        if (inserted >= options.cap) break;
      }

      cursor = page.meta.next_cursor ?? null;
      if (!cursor) break;
    }
  });

  const summary = summarize('stats', results);
  logger.info({ inserted: summary.inserted, duplicates: summary.duplicates, pages }, 'Stats ingestion finished');
  return summary;
}
