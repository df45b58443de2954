/**
 * Arena Repository
 *
 * Arenas are keyed by name; re-scraping a name refreshes its row in place.
 */

import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { SqliteDb } from '../client.js';
import type { ArenaRow, UpsertOutcome } from '../types.js';

export type ArenaInput = Omit<ArenaRow, 'id'>;

/**
 * Inserts an arena or updates team/city/coordinates of the existing row with that name
 */
export function upsertArena(db: SqliteDb, arena: ArenaInput): UpsertOutcome {
  const query = `
    INSERT INTO arenas (arena_name, team, city, latitude, longitude)
    VALUES (@arena_name, @team, @city, @latitude, @longitude)
    ON CONFLICT (arena_name) DO UPDATE SET
      team = excluded.team,
      city = excluded.city,
      latitude = excluded.latitude,
      longitude = excluded.longitude
  `;

  try {
    const existing = getArenaByName(db, arena.arena_name);
    db.prepare<ArenaInput>(query).run(arena);
    return existing ? 'updated' : 'inserted';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, arena: arena.arena_name }, 'Failed to upsert arena');
    throw new DatabaseError(`Failed to upsert arena: ${error.message}`, 'upsertArena', error);
  }
}

export function getArenaByName(db: SqliteDb, name: string): ArenaRow | null {
  const row = db.prepare<[string], ArenaRow>('SELECT * FROM arenas WHERE arena_name = ?').get(name);
  return row ?? null;
}

export function countArenas(db: SqliteDb): number {
  const row = db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM arenas').get();
  return row?.c ?? 0;
}

export function listArenas(db: SqliteDb): ArenaRow[] {
  return db.prepare<[], ArenaRow>('SELECT * FROM arenas ORDER BY id').all();
}
