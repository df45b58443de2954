/**
 * Team Repository
 *
 * Static team lookup used to relate a game's home team id to an arena.
 */

import type { SqliteDb } from '../client.js';
import type { TeamRow } from '../types.js';

/**
 * Inserts any teams not already present
 *
 * @returns number of rows inserted
 */
export function seedTeams(db: SqliteDb, teams: TeamRow[]): number {
  const stmt = db.prepare<TeamRow>(`
    INSERT INTO teams (team_id, abbreviation, city, name, full_name)
    VALUES (@team_id, @abbreviation, @city, @name, @full_name)
    ON CONFLICT (team_id) DO NOTHING
  `);

  const insertAll = db.transaction((rows: TeamRow[]) => {
    let inserted = 0;
    for (const row of rows) {
      inserted += stmt.run(row).changes;
    }
    return inserted;
  });

  return insertAll(teams);
}

export function getTeam(db: SqliteDb, teamId: number): TeamRow | null {
  const row = db.prepare<[number], TeamRow>('SELECT * FROM teams WHERE team_id = ?').get(teamId);
  return row ?? null;
}
