/**
 * Player Repository
 *
 * Players are written once, the first time they show up in a stats page.
 */

import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { SqliteDb } from '../client.js';
import type { PlayerRow, UpsertOutcome } from '../types.js';

/**
 * Inserts a player unless the id is already known
 *
 * Existing rows are never refreshed, even when the source reports new attributes.
 */
export function upsertPlayer(db: SqliteDb, player: PlayerRow): UpsertOutcome {
  const query = `
    INSERT INTO players (player_id, first_name, last_name, position, team_id)
    VALUES (@player_id, @first_name, @last_name, @position, @team_id)
    ON CONFLICT (player_id) DO NOTHING
  `;

  try {
    const { changes } = db.prepare<PlayerRow>(query).run(player);
    return changes > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, playerId: player.player_id }, 'Failed to upsert player');
    throw new DatabaseError(`Failed to upsert player: ${error.message}`, 'upsertPlayer', error);
  }
}

/**
 * Gets a player by ID
 */
export function getPlayer(db: SqliteDb, playerId: number): PlayerRow | null {
  const row = db.prepare<[number], PlayerRow>('SELECT * FROM players WHERE player_id = ?').get(playerId);
  return row ?? null;
}
