/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { existsSync, readFileSync } from 'fs';
import { INGESTION_LIMITS, PACING } from './constants.js';

export type SunTimesMode = 'arena' | 'game';

/**
 * Parses a comma-separated list of integers (e.g. "15,46,53")
 */
function intList(value: string | undefined, fallback: readonly number[]): number[] {
  if (!value) return [...fallback];
  return value
    .split(',')
    .map(v => v.trim())
    .filter(Boolean)
    .map(Number)
    .filter(n => Number.isInteger(n));
}

function sunTimesMode(value: string | undefined): SunTimesMode {
  return value === 'arena' ? 'arena' : 'game';
}

/**
 * Tracked players and seasons for the stats loop
 */
const DEFAULT_PLAYER_IDS = [15, 46, 53, 57, 73, 89, 101, 130, 133, 250, 251, 290, 324, 367, 375, 450] as const;
const DEFAULT_SEASONS = [2022, 2023] as const;

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // balldontlie stats API
  statsApi: {
    baseUrl: process.env.BALLDONTLIE_BASE_URL || 'https://api.balldontlie.io/v1',
    apiKey: process.env.BALLDONTLIE_API_KEY || '',
    apiKeyFile: process.env.BALLDONTLIE_API_KEY_FILE || 'SportsAPIKey.txt',
    playerIds: intList(process.env.TRACKED_PLAYER_IDS, DEFAULT_PLAYER_IDS),
    seasons: intList(process.env.TRACKED_SEASONS, DEFAULT_SEASONS),
    perPage: Math.min(Number(process.env.STATS_PER_PAGE || INGESTION_LIMITS.MAX_PER_PAGE), INGESTION_LIMITS.MAX_PER_PAGE)
  },
  // sunrise-sunset.org API
  sunApi: {
    baseUrl: process.env.SUN_API_URL || 'https://api.sunrise-sunset.org/json'
  },
  // Wikipedia arena directory
  arenas: {
    url: process.env.ARENAS_URL || 'https://en.wikipedia.org/wiki/List_of_NBA_arenas',
    seedDbPath: process.env.ARENA_SEED_DB_PATH || 'nba_project.db',
    csvPath: process.env.ARENAS_CSV_PATH || 'arenas.csv'
  },
  // SQLite store
  database: {
    path: process.env.DB_PATH || 'final_project_sportsdata.db'
  },
  // Collection runs
  collection: {
    totalRuns: Number(process.env.COLLECTION_RUNS || '8'),
    runDelayMs: Number(process.env.COLLECTION_RUN_DELAY_MS || PACING.RUN_DELAY_MS),
    statsCap: Number(process.env.STATS_CAP || INGESTION_LIMITS.DEFAULT_CAP),
    backfillCap: Number(process.env.BACKFILL_CAP || INGESTION_LIMITS.DEFAULT_CAP),
    sunTimesCap: Number(process.env.SUN_TIMES_CAP || INGESTION_LIMITS.DEFAULT_CAP),
    sunTimesBatchSize: Number(process.env.SUN_TIMES_BATCH_SIZE || INGESTION_LIMITS.DEFAULT_CAP),
    sunTimesDelayMs: Number(process.env.SUN_TIMES_DELAY_MS || PACING.SUN_API_DELAY_MS),
    sunTimesMode: sunTimesMode(process.env.SUN_TIMES_MODE)
  },
  // Report outputs
  report: {
    textPath: process.env.REPORT_TEXT_PATH || 'sunset_analysis_results.txt',
    chartPath: process.env.REPORT_CHART_PATH || 'sunset_performance_visualizations.html'
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};

/**
 * Resolves the stats API key
 *
 * The environment variable wins; otherwise the key file is read.
 * An empty string is returned when neither is present (requests will then fail with 401).
 */
export function loadStatsApiKey(): string {
  if (cfg.statsApi.apiKey) return cfg.statsApi.apiKey;
  if (existsSync(cfg.statsApi.apiKeyFile)) {
    return readFileSync(cfg.statsApi.apiKeyFile, 'utf-8').trim();
  }
  return '';
}
