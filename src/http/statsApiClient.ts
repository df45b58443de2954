/**
 * Stats API Client Module
 *
 * URL builders and fetchers for the balldontlie v1 API.
 * Every request carries the API key in the Authorization header.
 */

import { cfg, loadStatsApiKey } from '../core/config.js';
import { logger } from '../core/logger.js';
import { httpGet } from '../util/http.js';
import { isValidUrl, ValidationError } from '../util/validation.js';
import type { GameDetail, GameDetailResponse, StatsPage } from '../types/api.js';

/**
 * Parameters of one /stats page request
 */
export interface StatsQuery {
  playerIds: number[];
  seasons: number[];
  perPage: number;
  cursor?: number | string | null;
}

/**
 * What the ingestion loops need from the stats provider
 */
export interface StatsSource {
  /** Never throws on HTTP errors: a failed page comes back empty with no cursor */
  fetchStatsPage(query: StatsQuery): Promise<StatsPage>;

  /** Resolves to null when the game could not be fetched */
  fetchGame(gameId: number): Promise<GameDetail | null>;
}

export const EMPTY_PAGE: StatsPage = { data: [], meta: { next_cursor: null } };

function baseUrl(): string {
  const url = cfg.statsApi.baseUrl;
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid stats API URL: ${url}`, 'baseUrl');
  }
  return url.replace(/\/+$/, '');
}

/**
 * @example
 * statsUrl() // https://api.balldontlie.io/v1/stats
 */
export function statsUrl(): string {
  return `${baseUrl()}/stats`;
}

/**
 * @example
 * gameUrl(857) // https://api.balldontlie.io/v1/games/857
 */
export function gameUrl(gameId: number): string {
  if (!Number.isInteger(gameId) || gameId <= 0) {
    throw new ValidationError(`Invalid game ID: ${gameId}`, 'gameId');
  }
  return `${baseUrl()}/games/${gameId}`;
}

/**
 * Builds a StatsSource backed by the live API
 */
export function createStatsApiClient(apiKey: string = loadStatsApiKey()): StatsSource {
  const headers = { Authorization: apiKey };

  return {
    async fetchStatsPage(query: StatsQuery): Promise<StatsPage> {
      const params: Record<string, unknown> = {
        player_ids: query.playerIds,
        seasons: query.seasons,
        per_page: query.perPage
      };
      if (query.cursor) params.cursor = query.cursor;

      const url = statsUrl();
      const res = await httpGet<StatsPage>(url, { params, headers });
      if (res.status !== 200 || !res.data) {
        logger.warn({ status: res.status, cursor: query.cursor ?? null }, 'Error fetching stats page');
        return EMPTY_PAGE;
      }
      return res.data;
    },

    async fetchGame(gameId: number): Promise<GameDetail | null> {
      const res = await httpGet<GameDetailResponse>(gameUrl(gameId), { headers });
      if (res.status !== 200 || !res.data) {
        logger.warn({ status: res.status, gameId }, 'Error fetching game detail');
        return null;
      }
      return res.data.data;
    }
  };
}
