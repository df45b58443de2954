/**
 * Player Performance Analysis
 *
 * Averages each player's points, rebounds and assists in games that
 * started before vs after sunset. Only players with at least one game
 * on each side are kept.
 */

import type { SqliteDb } from '../db/client.js';
import { logger } from '../core/logger.js';
import { classifyGame, type SunsetCategory } from './sunset.js';

/**
 * One stat line joined with its player, game time and sunset
 */
export interface SunsetStatRow {
  player_id: number;
  first_name: string | null;
  last_name: string | null;
  pts: number | null;
  reb: number | null;
  ast: number | null;
  date: string | null;
  time: string;
  sunset: string;
}

export interface CategoryAverages {
  games: number;
  avgPts: number;
  avgReb: number;
  avgAst: number;
}

export interface PlayerComparison {
  playerId: number;
  name: string;
  beforeSunset: CategoryAverages;
  afterSunset: CategoryAverages;
  /** after minus before */
  differences: {
    ptsDiff: number;
    rebDiff: number;
    astDiff: number;
  };
}

interface StatLists {
  pts: number[];
  reb: number[];
  ast: number[];
}

interface PlayerBuckets {
  name: string;
  before_sunset: StatLists;
  after_sunset: StatLists;
}

/**
 * Stat lines that have both a tip-off time and a sunset
 */
export function selectSunsetStatRows(db: SqliteDb): SunsetStatRow[] {
  const query = `
    SELECT gs.player_id, p.first_name, p.last_name,
           gs.pts, gs.reb, gs.ast,
           g.date, g.time, gd.sunset
    FROM game_stats gs
    JOIN players p ON gs.player_id = p.player_id
    JOIN games g ON gs.game_id = g.game_id
    JOIN game_daylight_info gd ON g.game_id = gd.game_id
    WHERE g.time IS NOT NULL AND gd.sunset IS NOT NULL
    ORDER BY gs.stat_id
  `;
  return db.prepare<[], SunsetStatRow>(query).all();
}

const mean = (values: number[]): number => values.reduce((sum, v) => sum + v, 0) / values.length;

function averages(lists: StatLists): CategoryAverages {
  return {
    games: lists.pts.length,
    avgPts: mean(lists.pts),
    avgReb: mean(lists.reb),
    avgAst: mean(lists.ast)
  };
}

/**
 * Groups stat lines per player and category and compares the averages
 *
 * Missing stat values count as 0. Rows whose times cannot be parsed are skipped.
 *
 * @returns comparisons keyed by player id, in order of first appearance
 */
export function aggregatePerformance(rows: SunsetStatRow[]): Map<number, PlayerComparison> {
  const buckets = new Map<number, PlayerBuckets>();
  let skipped = 0;

  for (const row of rows) {
    const category: SunsetCategory | null = classifyGame(row.time, row.sunset);
    if (!category) {
      skipped++;
      continue;
    }

    let player = buckets.get(row.player_id);
    if (!player) {
      player = {
        name: `${row.first_name ?? ''} ${row.last_name ?? ''}`.trim(),
        before_sunset: { pts: [], reb: [], ast: [] },
        after_sunset: { pts: [], reb: [], ast: [] }
      };
      buckets.set(row.player_id, player);
    }

    const lists = player[category];
    lists.pts.push(row.pts ?? 0);
    lists.reb.push(row.reb ?? 0);
    lists.ast.push(row.ast ?? 0);
  }

  if (skipped > 0) {
    logger.warn({ skipped }, 'Skipped stat rows with unparseable times');
  }

  const results = new Map<number, PlayerComparison>();
  for (const [playerId, player] of buckets) {
    if (player.before_sunset.pts.length === 0 || player.after_sunset.pts.length === 0) continue;

    const beforeSunset = averages(player.before_sunset);
    const afterSunset = averages(player.after_sunset);
    results.set(playerId, {
      playerId,
      name: player.name,
      beforeSunset,
      afterSunset,
      differences: {
        ptsDiff: afterSunset.avgPts - beforeSunset.avgPts,
        rebDiff: afterSunset.avgReb - beforeSunset.avgReb,
        astDiff: afterSunset.avgAst - beforeSunset.avgAst
      }
    });
  }
  return results;
}

export function analyzePlayerPerformance(db: SqliteDb): Map<number, PlayerComparison> {
  return aggregatePerformance(selectSunsetStatRows(db));
}

/**
 * Players ordered by the size of their points swing, largest first
 */
export function rankByPointSwing(results: Map<number, PlayerComparison>): PlayerComparison[] {
  return [...results.values()].sort(
    (a, b) => Math.abs(b.differences.ptsDiff) - Math.abs(a.differences.ptsDiff)
  );
}
