/**
 * Game-Detail Backfill Service
 *
 * Completes game stubs (date, tip-off time, teams, season) from the
 * per-game endpoint, up to a per-invocation cap.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { inTransaction, type SqliteDb } from '../db/client.js';
import { selectGamesMissingDetail, updateGameDetail } from '../db/repositories/games.js';
import { summarize, type LoopSummary, type UnitResult } from '../models/results.js';
import { isValidDateISO, ValidationError } from '../util/validation.js';
import type { StatsSource } from '../http/statsApiClient.js';
import type { GameDetail } from '../types/api.js';
import type { GameRow } from '../db/types.js';

export interface BackfillOptions {
  /** Maximum games updated per invocation */
  cap: number;
}

/**
 * Splits an ISO date-time into date and clock time
 *
 * The time keeps everything after 'T' minus the 'Z'. The source reports
 * unknown tip-offs as midnight, so a time starting with 00:00 becomes null.
 *
 * @example
 * splitGameDateTime('2023-01-05T00:30:00.000Z') // { date: '2023-01-05', time: '00:30:00.000' }
 * splitGameDateTime('2023-01-05T00:00:00.000Z') // { date: '2023-01-05', time: null }
 */
export function splitGameDateTime(iso: string): { date: string; time: string | null } {
  const [date, rest] = iso.split('T');
  if (!isValidDateISO(date) || rest === undefined) {
    throw new ValidationError(`Invalid game datetime: ${iso}`, 'datetime');
  }
  const time = rest.replace('Z', '');
  return { date, time: time.startsWith('00:00') ? null : time };
}

/**
 * Maps an API game onto the games row it completes
 */
export function toGameRow(game: GameDetail): GameRow {
  const { date, time } = splitGameDateTime(game.datetime);
  return {
    game_id: game.id,
    date,
    time,
    home_team_id: game.home_team.id,
    visitor_team_id: game.visitor_team.id,
    season: game.season
  };
}

/**
 * Runs one backfill invocation
 *
 * A game that cannot be fetched or parsed is skipped (not counted) and stays
 * selectable for a later invocation.
 */
export async function backfillGameDetails(
  db: SqliteDb,
  source: StatsSource,
  options: BackfillOptions = { cap: cfg.collection.backfillCap }
): Promise<LoopSummary> {
  const results: UnitResult[] = [];
  let updated = 0;

  await inTransaction(db, async () => {
    const gameIds = selectGamesMissingDetail(db);
    logger.debug({ candidates: gameIds.length }, 'Games missing detail');

    for (const gameId of gameIds) {
      if (updated >= options.cap) break;

      const game = await source.fetchGame(gameId);
      if (!game) {
        results.push({ status: 'failed', key: gameId, reason: 'game detail unavailable' });
        continue;
      }

      let row: GameRow;
      try {
        row = toGameRow(game);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.warn({ gameId, reason }, 'Skipping game with unusable datetime');
        results.push({ status: 'failed', key: gameId, reason });
        continue;
      }

      if (updateGameDetail(db, row)) {
        updated++;
        results.push({ status: 'inserted', key: gameId });
      }
    }
  });

  const summary = summarize('gameBackfill', results);
  logger.info({ updated: summary.inserted, skipped: summary.failures.length }, 'Game backfill finished');
  return summary;
}
