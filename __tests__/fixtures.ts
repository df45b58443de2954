/**
 * Shared builders and in-process fakes for the ingestion tests
 */

import type { StatsQuery, StatsSource } from '../src/http/statsApiClient.js';
import type { SunTimeQuery, SunTimes, SunTimeSource } from '../src/http/sunApiClient.js';
import type { GameDetail, StatRecord, StatsPage } from '../src/types/api.js';

export function statRecord(id: number, playerId: number, gameId: number, pts = 10): StatRecord {
  return {
    id,
    pts,
    reb: 5,
    ast: 3,
    player: { id: playerId, first_name: `First${playerId}`, last_name: `Last${playerId}`, position: 'G' },
    team: { id: 14 },
    game: { id: gameId }
  };
}

/**
 * Records 1..count, one game each, for player 15
 */
export function statRecords(count: number, firstId = 1): StatRecord[] {
  return Array.from({ length: count }, (_, i) => statRecord(firstId + i, 15, 1000 + firstId + i));
}

export function gameDetail(id: number, datetime: string, homeTeamId = 14, visitorTeamId = 2): GameDetail {
  return {
    id,
    date: datetime.slice(0, 10),
    datetime,
    season: 2023,
    home_team: { id: homeTeamId },
    visitor_team: { id: visitorTeamId }
  };
}

/**
 * Serves fixed pages in cursor order: page i carries cursor i + 1, the last none
 */
export class FakeStatsSource implements StatsSource {
  readonly pageQueries: StatsQuery[] = [];
  readonly gameRequests: number[] = [];

  private readonly games = new Map<number, GameDetail>();

  constructor(
    private readonly pages: StatRecord[][] = [],
    games: GameDetail[] = []
  ) {
    for (const game of games) this.games.set(game.id, game);
  }

  async fetchStatsPage(query: StatsQuery): Promise<StatsPage> {
    this.pageQueries.push(query);
    const index = typeof query.cursor === 'number' ? query.cursor : 0;
    const data = this.pages[index] ?? [];
    const next = index + 1 < this.pages.length ? index + 1 : null;
    return { data, meta: { next_cursor: next } };
  }

  async fetchGame(gameId: number): Promise<GameDetail | null> {
    this.gameRequests.push(gameId);
    return this.games.get(gameId) ?? null;
  }
}

/**
 * Answers every query with the same times, failing for the listed latitudes
 */
export class FakeSunSource implements SunTimeSource {
  readonly queries: SunTimeQuery[] = [];

  constructor(
    private readonly times: SunTimes = {
      sunrise: '2023-01-05T12:20:00+00:00',
      sunset: '2023-01-05T21:45:00+00:00'
    },
    private readonly failingLatitudes: number[] = []
  ) {}

  async fetchSunTimes(query: SunTimeQuery): Promise<SunTimes> {
    this.queries.push(query);
    if (this.failingLatitudes.includes(query.latitude)) {
      throw new Error(`lookup failed for ${query.latitude}`);
    }
    return this.times;
  }
}
