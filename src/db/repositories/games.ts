/**
 * Game Repository
 *
 * Games start life as id-only stubs and are completed by the backfill loop.
 */

import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { SqliteDb } from '../client.js';
import type { GameRow, UpsertOutcome } from '../types.js';

/**
 * Inserts a bare game row (id only) unless the id is already known
 */
export function upsertGameStub(db: SqliteDb, gameId: number): UpsertOutcome {
  try {
    const { changes } = db
      .prepare<[number]>('INSERT INTO games (game_id) VALUES (?) ON CONFLICT (game_id) DO NOTHING')
      .run(gameId);
    return changes > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, gameId }, 'Failed to upsert game stub');
    throw new DatabaseError(`Failed to upsert game stub: ${error.message}`, 'upsertGameStub', error);
  }
}

/**
 * Fills in schedule details for an existing game
 *
 * @returns true if a row was updated
 */
export function updateGameDetail(db: SqliteDb, detail: GameRow): boolean {
  const query = `
    UPDATE games
    SET date = @date,
        time = @time,
        home_team_id = @home_team_id,
        visitor_team_id = @visitor_team_id,
        season = @season
    WHERE game_id = @game_id
  `;

  try {
    return db.prepare<GameRow>(query).run(detail).changes > 0;
  } catch (err) {
    const error = toError(err);
    logger.error({ err, gameId: detail.game_id }, 'Failed to update game detail');
    throw new DatabaseError(`Failed to update game detail: ${error.message}`, 'updateGameDetail', error);
  }
}

/**
 * Ids of games still missing a date or a time
 *
 * Undated stubs come first: games whose tip-off is unknown (null time) stay
 * selectable forever and must not crowd new stubs out of a capped run.
 */
export function selectGamesMissingDetail(db: SqliteDb): number[] {
  const query = `
    SELECT game_id FROM games
    WHERE date IS NULL OR time IS NULL
    ORDER BY date IS NOT NULL, game_id
  `;
  return db
    .prepare<[], { game_id: number }>(query)
    .all()
    .map(row => row.game_id);
}

/**
 * Gets a game by ID
 */
export function getGame(db: SqliteDb, gameId: number): GameRow | null {
  const row = db.prepare<[number], GameRow>('SELECT * FROM games WHERE game_id = ?').get(gameId);
  return row ?? null;
}
