/**
 * Game Stat Repository
 *
 * Stat rows are immutable: written once per stat id.
 */

import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { SqliteDb } from '../client.js';
import type { GameStatRow, UpsertOutcome } from '../types.js';

/**
 * Inserts a stat row if its id is unknown
 *
 * @returns 'inserted', or 'duplicate' when the stat id is already stored
 */
export function insertStatIfAbsent(db: SqliteDb, stat: GameStatRow): UpsertOutcome {
  const query = `
    INSERT INTO game_stats (stat_id, player_id, game_id, pts, reb, ast)
    VALUES (@stat_id, @player_id, @game_id, @pts, @reb, @ast)
    ON CONFLICT (stat_id) DO NOTHING
  `;

  try {
    const { changes } = db.prepare<GameStatRow>(query).run(stat);
    if (changes === 0) {
      logger.debug({ statId: stat.stat_id }, 'Stat skipped (duplicate id)');
      return 'duplicate';
    }
    return 'inserted';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, statId: stat.stat_id }, 'Failed to insert stat');
    throw new DatabaseError(`Failed to insert stat: ${error.message}`, 'insertStatIfAbsent', error);
  }
}

export function countStats(db: SqliteDb): number {
  const row = db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM game_stats').get();
  return row?.c ?? 0;
}
