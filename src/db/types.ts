/**
 * Database Entity Types
 *
 * TypeScript interfaces matching database schema.
 */

export interface PlayerRow {
  player_id: number;
  first_name: string | null;
  last_name: string | null;
  position: string | null;
  team_id: number | null;
}

export interface GameRow {
  game_id: number;
  date: string | null; // YYYY-MM-DD (UTC)
  time: string | null; // HH:MM:SS.sss (UTC), null when the source reported midnight
  home_team_id: number | null;
  visitor_team_id: number | null;
  season: number | null;
}

export interface GameStatRow {
  stat_id: number;
  player_id: number;
  game_id: number;
  pts: number | null;
  reb: number | null;
  ast: number | null;
}

export interface ArenaRow {
  id: number;
  arena_name: string;
  team: string | null;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface DaylightRow {
  arena_id: number;
  sunrise: string;
  sunset: string;
}

export interface GameDaylightRow {
  game_id: number;
  date: string;
  home_team_id: number | null;
  arena_id: number;
  arena_name: string;
  latitude: number;
  longitude: number;
  sunrise: string;
  sunset: string;
}

export interface TeamRow {
  team_id: number;
  abbreviation: string;
  city: string;
  name: string;
  full_name: string;
}

/**
 * Result of a guarded write
 *
 * - inserted: a new row was created
 * - updated: an existing row was changed in place
 * - duplicate: the identity was already stored, nothing written
 */
export type UpsertOutcome = 'inserted' | 'updated' | 'duplicate';
