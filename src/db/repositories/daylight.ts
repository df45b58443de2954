/**
 * Daylight Repository
 *
 * Sunrise/sunset rows keyed by arena (daylight_info) or by game
 * (game_daylight_info). Rows are written once and never updated.
 * The select functions are the anti-joins that find unprocessed keys.
 */

import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { SqliteDb } from '../client.js';
import type { DaylightRow, GameDaylightRow, UpsertOutcome } from '../types.js';

/**
 * Arena awaiting a daylight lookup
 */
export interface ArenaCandidate {
  id: number;
  arena_name: string;
  latitude: number;
  longitude: number;
}

/**
 * Game awaiting a daylight lookup, with the arena it is played in
 */
export type GameCandidate = Omit<GameDaylightRow, 'sunrise' | 'sunset'>;

export function insertDaylightIfAbsent(db: SqliteDb, row: DaylightRow): UpsertOutcome {
  const query = `
    INSERT INTO daylight_info (arena_id, sunrise, sunset)
    VALUES (@arena_id, @sunrise, @sunset)
    ON CONFLICT (arena_id) DO NOTHING
  `;

  try {
    return db.prepare<DaylightRow>(query).run(row).changes > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, arenaId: row.arena_id }, 'Failed to insert daylight info');
    throw new DatabaseError(`Failed to insert daylight info: ${error.message}`, 'insertDaylightIfAbsent', error);
  }
}

export function insertGameDaylightIfAbsent(db: SqliteDb, row: GameDaylightRow): UpsertOutcome {
  const query = `
    INSERT INTO game_daylight_info (
      game_id, date, home_team_id, arena_id, arena_name, latitude, longitude, sunrise, sunset
    ) VALUES (
      @game_id, @date, @home_team_id, @arena_id, @arena_name, @latitude, @longitude, @sunrise, @sunset
    )
    ON CONFLICT (game_id) DO NOTHING
  `;

  try {
    return db.prepare<GameDaylightRow>(query).run(row).changes > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, gameId: row.game_id }, 'Failed to insert game daylight info');
    throw new DatabaseError(
      `Failed to insert game daylight info: ${error.message}`,
      'insertGameDaylightIfAbsent',
      error
    );
  }
}

/**
 * Arenas with coordinates and no daylight_info row
 *
 * @param exclude - arena ids to leave out (e.g. ones that already failed in this run)
 */
export function selectArenasMissingDaylight(db: SqliteDb, limit: number, exclude: number[] = []): ArenaCandidate[] {
  const query = `
    SELECT id, arena_name, latitude, longitude
    FROM arenas
    WHERE latitude IS NOT NULL
      AND longitude IS NOT NULL
      AND id NOT IN (SELECT arena_id FROM daylight_info)
      AND id NOT IN (SELECT value FROM json_each(?))
    ORDER BY id
    LIMIT ?
  `;
  return db.prepare<[string, number], ArenaCandidate>(query).all(JSON.stringify(exclude), limit);
}

/**
 * Dated games whose home arena has coordinates and that have no game_daylight_info row
 *
 * A game is placed in the lowest-id arena whose team text names its home team.
 */
export function selectGamesMissingDaylight(db: SqliteDb, limit: number, exclude: number[] = []): GameCandidate[] {
  const query = `
    SELECT g.game_id, g.date, g.home_team_id,
           a.id AS arena_id, a.arena_name, a.latitude, a.longitude
    FROM games g
    JOIN teams t ON t.team_id = g.home_team_id
    JOIN arenas a ON a.id = (
      SELECT a2.id FROM arenas a2
      WHERE instr(a2.team, t.name) > 0
        AND a2.latitude IS NOT NULL
        AND a2.longitude IS NOT NULL
      ORDER BY a2.id
      LIMIT 1
    )
    WHERE g.date IS NOT NULL
      AND g.game_id NOT IN (SELECT game_id FROM game_daylight_info)
      AND g.game_id NOT IN (SELECT value FROM json_each(?))
    ORDER BY g.game_id
    LIMIT ?
  `;
  return db.prepare<[string, number], GameCandidate>(query).all(JSON.stringify(exclude), limit);
}
