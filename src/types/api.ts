/**
 * External API Type Definitions
 *
 * Minimal shapes of the balldontlie and sunrise-sunset.org responses,
 * limited to the fields this project reads.
 */

/**
 * Team reference embedded in stats and game payloads
 */
export interface TeamRef {
  id: number;
  abbreviation?: string;
  full_name?: string;
}

/**
 * Player embedded in a stat record
 */
export interface StatPlayer {
  id: number;
  first_name: string;
  last_name: string;
  position: string;
  team_id?: number;
}

/**
 * Game embedded in a stat record (only the id is used)
 */
export interface StatGame {
  id: number;
  date?: string;
  season?: number;
}

/**
 * One player's box score line for one game
 */
export interface StatRecord {
  id: number;
  pts: number | null;
  reb: number | null;
  ast: number | null;
  player: StatPlayer;
  team: TeamRef;
  game: StatGame;
}

/**
 * Cursor-paginated response from /stats
 */
export interface StatsPage {
  data: StatRecord[];
  meta: {
    next_cursor?: number | string | null;
    per_page?: number;
  };
}

/**
 * Full game record from /games/{id}
 */
export interface GameDetail {
  id: number;
  date: string;
  datetime: string; // ISO date-time in UTC, midnight when the tip-off is unknown
  season: number;
  home_team: TeamRef;
  visitor_team: TeamRef;
}

export interface GameDetailResponse {
  data: GameDetail;
}

/**
 * sunrise-sunset.org response (formatted=0 gives ISO 8601 timestamps)
 */
export interface SunApiResponse {
  results: {
    sunrise: string;
    sunset: string;
    [key: string]: unknown;
  };
  status: string; // 'OK' on success, e.g. 'INVALID_REQUEST' otherwise
}
