import { describe, it, expect } from 'vitest';
import {
  improvementSplit,
  leagueAverages,
  pointsPairs,
  reboundAssistSwings,
  renderChartsHtml,
  topPointSwings
} from '../../src/analysis/charts.js';
import type { PlayerComparison } from '../../src/analysis/performance.js';

function comparison(playerId: number, name: string, before: number[], after: number[]): PlayerComparison {
  const [bp, br, ba] = before;
  const [ap, ar, aa] = after;
  return {
    playerId,
    name,
    beforeSunset: { games: 3, avgPts: bp, avgReb: br, avgAst: ba },
    afterSunset: { games: 3, avgPts: ap, avgReb: ar, avgAst: aa },
    differences: { ptsDiff: ap - bp, rebDiff: ar - br, astDiff: aa - ba }
  };
}

const results = new Map([
  [1, comparison(1, 'Ann Alpha', [10, 4, 2], [14, 4, 3])],
  [2, comparison(2, 'Ben Van Beta', [20, 10, 6], [17, 4, 6])],
  [3, comparison(3, 'Cal Gamma', [12, 6, 4], [12, 7, 2])]
]);

describe('chart data', () => {
  it('should rank point swings from largest gain to largest drop', () => {
    expect(topPointSwings(results)).toEqual([
      { name: 'Alpha', ptsDiff: 4 },
      { name: 'Gamma', ptsDiff: 0 },
      { name: 'Beta', ptsDiff: -3 }
    ]);
    expect(topPointSwings(results, 1)).toEqual([{ name: 'Alpha', ptsDiff: 4 }]);
  });

  it('should pair each player points before and after sunset', () => {
    expect(pointsPairs(results)).toEqual([
      { before: 10, after: 14 },
      { before: 20, after: 17 },
      { before: 12, after: 12 }
    ]);
  });

  it('should average the per-player averages across the league', () => {
    expect(leagueAverages(results)).toEqual([
      { stat: 'Points', before: 14, after: 43 / 3 },
      { stat: 'Rebounds', before: 20 / 3, after: 5 },
      { stat: 'Assists', before: 4, after: 11 / 3 }
    ]);
  });

  it('should count players better, worse or unchanged after sunset', () => {
    expect(improvementSplit(results)).toEqual([
      { label: 'Better After Sunset', value: 1 },
      { label: 'Worse After Sunset', value: 1 },
      { label: 'No Change', value: 1 }
    ]);
  });

  it('should pick the largest rebound swings by magnitude', () => {
    expect(reboundAssistSwings(results, 2)).toEqual([
      { name: 'Beta', rebDiff: -6, astDiff: 0 },
      { name: 'Gamma', rebDiff: 1, astDiff: -2 }
    ]);
  });

  it('should return empty series when there are no players', () => {
    expect(topPointSwings(new Map())).toEqual([]);
    expect(leagueAverages(new Map()).map(a => a.before)).toEqual([0, 0, 0]);
  });
});

describe('renderChartsHtml', () => {
  it('should render a standalone page with one titled panel per chart', () => {
    const html = renderChartsHtml(results);

    expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(html).toContain('<title>Player Performance Before vs After Sunset</title>');
    expect(html.match(/<h2 /g)).toHaveLength(5);
    expect(html).toContain('Top 10: Better After Sunset?');
    expect(html).toContain('Rebounds &amp; Assists Changes');
  });
});
