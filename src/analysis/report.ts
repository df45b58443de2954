/**
 * Sunset Performance Report
 *
 * Renders the before/after-sunset comparison as a ranked plain-text report.
 */

import { writeFileSync } from 'fs';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { SUNSET } from '../core/constants.js';
import { openDatabase } from '../db/client.js';
import { analyzePlayerPerformance, rankByPointSwing, type PlayerComparison } from './performance.js';

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

const fixed = (n: number): string => n.toFixed(2);
const signed = (n: number): string => `${n >= 0 ? '+' : '-'}${Math.abs(n).toFixed(2)}`;

function formatPlayer(player: PlayerComparison): string[] {
  const { beforeSunset: before, afterSunset: after, differences: diff } = player;
  const lines = [
    `${player.name} (ID: ${player.playerId})`,
    DIVIDER,
    `BEFORE SUNSET (${before.games} games):`,
    `  Points: ${fixed(before.avgPts)} | Rebounds: ${fixed(before.avgReb)} | Assists: ${fixed(before.avgAst)}`,
    `AFTER SUNSET (${after.games} games):`,
    `  Points: ${fixed(after.avgPts)} | Rebounds: ${fixed(after.avgReb)} | Assists: ${fixed(after.avgAst)}`,
    'DIFFERENCE:',
    `  Points: ${signed(diff.ptsDiff)} | Rebounds: ${signed(diff.rebDiff)} | Assists: ${signed(diff.astDiff)}`
  ];

  if (Math.abs(diff.ptsDiff) > SUNSET.NOTABLE_POINTS_DIFF) {
    const direction = diff.ptsDiff > 0 ? 'better' : 'worse';
    lines.push(`  >> Performs ${direction} after sunset (${fixed(Math.abs(diff.ptsDiff))} pts difference)`);
  }

  lines.push('');
  return lines;
}

/**
 * Formats the report text, players ranked by absolute points difference
 */
export function formatReport(results: Map<number, PlayerComparison>): string {
  const lines = [RULE, 'PLAYER PERFORMANCE ANALYSIS: BEFORE vs AFTER SUNSET', RULE, ''];

  if (results.size === 0) {
    lines.push('No data available for analysis.');
  } else {
    for (const player of rankByPointSwing(results)) {
      lines.push(...formatPlayer(player));
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Analyzes the store and writes the text report
 */
export function writeReport(dbPath: string = cfg.database.path, outPath: string = cfg.report.textPath): number {
  const db = openDatabase(dbPath);
  try {
    const results = analyzePlayerPerformance(db);
    writeFileSync(outPath, formatReport(results), 'utf-8');
    logger.info({ players: results.size, outPath }, 'Sunset analysis report written');
    return results.size;
  } finally {
    db.close();
  }
}

// Run if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('report.ts')) {
  try {
    writeReport();
  } catch (err) {
    logger.error({ err }, 'Report failed');
    process.exit(1);
  }
}
