/**
 * Sunset Performance Charts
 *
 * Five panels summarizing the before/after-sunset comparison, rendered
 * server-side with Recharts into one static HTML page of SVG charts.
 */

import { writeFileSync } from 'fs';
import type { ReactNode } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Legend,
  Pie,
  PieChart,
  ReferenceLine,
  Scatter,
  ScatterChart,
  XAxis,
  YAxis
} from 'recharts';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { openDatabase } from '../db/client.js';
import { analyzePlayerPerformance, type PlayerComparison } from './performance.js';

const PANEL_WIDTH = 480;
const PANEL_HEIGHT = 320;

export interface PointSwing {
  name: string;
  ptsDiff: number;
}

export interface PointsPair {
  before: number;
  after: number;
}

export interface LeagueAverage {
  stat: 'Points' | 'Rebounds' | 'Assists';
  before: number;
  after: number;
}

export interface ImprovementSlice {
  label: 'Better After Sunset' | 'Worse After Sunset' | 'No Change';
  value: number;
}

export interface ReboundAssistSwing {
  name: string;
  rebDiff: number;
  astDiff: number;
}

const lastName = (name: string): string => name.split(/\s+/).pop() ?? name;

const average = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Players with the largest points gain after sunset (signed, descending)
 */
export function topPointSwings(results: Map<number, PlayerComparison>, limit = 10): PointSwing[] {
  return [...results.values()]
    .sort((a, b) => b.differences.ptsDiff - a.differences.ptsDiff)
    .slice(0, limit)
    .map(p => ({ name: lastName(p.name), ptsDiff: p.differences.ptsDiff }));
}

export function pointsPairs(results: Map<number, PlayerComparison>): PointsPair[] {
  return [...results.values()].map(p => ({ before: p.beforeSunset.avgPts, after: p.afterSunset.avgPts }));
}

/**
 * League-wide mean of the per-player averages
 */
export function leagueAverages(results: Map<number, PlayerComparison>): LeagueAverage[] {
  const players = [...results.values()];
  return [
    {
      stat: 'Points',
      before: average(players.map(p => p.beforeSunset.avgPts)),
      after: average(players.map(p => p.afterSunset.avgPts))
    },
    {
      stat: 'Rebounds',
      before: average(players.map(p => p.beforeSunset.avgReb)),
      after: average(players.map(p => p.afterSunset.avgReb))
    },
    {
      stat: 'Assists',
      before: average(players.map(p => p.beforeSunset.avgAst)),
      after: average(players.map(p => p.afterSunset.avgAst))
    }
  ];
}

export function improvementSplit(results: Map<number, PlayerComparison>): ImprovementSlice[] {
  const diffs = [...results.values()].map(p => p.differences.ptsDiff);
  return [
    { label: 'Better After Sunset', value: diffs.filter(d => d > 0).length },
    { label: 'Worse After Sunset', value: diffs.filter(d => d < 0).length },
    { label: 'No Change', value: diffs.filter(d => d === 0).length }
  ];
}

/**
 * Players with the largest rebound swing (by magnitude), with their assist swing
 */
export function reboundAssistSwings(results: Map<number, PlayerComparison>, limit = 8): ReboundAssistSwing[] {
  return [...results.values()]
    .sort((a, b) => Math.abs(b.differences.rebDiff) - Math.abs(a.differences.rebDiff))
    .slice(0, limit)
    .map(p => ({ name: lastName(p.name), rebDiff: p.differences.rebDiff, astDiff: p.differences.astDiff }));
}

const SLICE_COLORS = ['lightgreen', 'lightcoral', 'lightgray'];

function Panel({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section style={{ display: 'inline-block', margin: 12, verticalAlign: 'top' }}>
      <h2 style={{ fontSize: 16, fontFamily: 'sans-serif' }}>{title}</h2>
      {children}
    </section>
  );
}

export function SunsetDashboard({ results }: { results: Map<number, PlayerComparison> }) {
  const swings = topPointSwings(results);
  const pairs = pointsPairs(results);
  const maxPoints = Math.max(0, ...pairs.flatMap(p => [p.before, p.after]));
  const league = leagueAverages(results);
  const split = improvementSplit(results);
  const reboundSwings = reboundAssistSwings(results);

  return (
    <main>
      <Panel title="Top 10: Better After Sunset?">
        <BarChart width={PANEL_WIDTH} height={PANEL_HEIGHT} data={swings} layout="vertical">
          <CartesianGrid strokeDasharray="3 3" horizontal={false} />
          <XAxis type="number" />
          <YAxis type="category" dataKey="name" width={100} />
          <ReferenceLine x={0} stroke="black" />
          <Bar dataKey="ptsDiff" name="Point Difference" isAnimationActive={false}>
            {swings.map(s => (
              <Cell key={s.name} fill={s.ptsDiff > 0 ? 'green' : 'red'} />
            ))}
          </Bar>
        </BarChart>
      </Panel>

      <Panel title="Do Players Score More After Sunset?">
        <ScatterChart width={PANEL_WIDTH} height={PANEL_HEIGHT}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis type="number" dataKey="before" name="Points Before Sunset" />
          <YAxis type="number" dataKey="after" name="Points After Sunset" />
          <ReferenceLine
            segment={[{ x: 0, y: 0 }, { x: maxPoints, y: maxPoints }]}
            stroke="red"
            strokeDasharray="6 4"
          />
          <Scatter data={pairs} fill="steelblue" isAnimationActive={false} />
        </ScatterChart>
      </Panel>

      <Panel title="Overall: Before vs After Sunset">
        <BarChart width={PANEL_WIDTH} height={PANEL_HEIGHT} data={league}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="stat" />
          <YAxis />
          <Legend />
          <Bar dataKey="before" name="Before Sunset" fill="orange" isAnimationActive={false} />
          <Bar dataKey="after" name="After Sunset" fill="darkblue" isAnimationActive={false} />
        </BarChart>
      </Panel>

      <Panel title="Players: Better or Worse After Sunset?">
        <PieChart width={PANEL_WIDTH} height={PANEL_HEIGHT}>
          <Pie data={split} dataKey="value" nameKey="label" outerRadius={110} label isAnimationActive={false}>
            {split.map((slice, i) => (
              <Cell key={slice.label} fill={SLICE_COLORS[i]} />
            ))}
          </Pie>
          <Legend />
        </PieChart>
      </Panel>

      <Panel title="Rebounds & Assists Changes">
        <BarChart width={PANEL_WIDTH} height={PANEL_HEIGHT} data={reboundSwings}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="name" />
          <YAxis />
          <ReferenceLine y={0} stroke="black" />
          <Legend />
          <Bar dataKey="rebDiff" name="Rebounds" fill="coral" isAnimationActive={false} />
          <Bar dataKey="astDiff" name="Assists" fill="skyblue" isAnimationActive={false} />
        </BarChart>
      </Panel>
    </main>
  );
}

/**
 * Renders the dashboard as a standalone HTML document
 */
export function renderChartsHtml(results: Map<number, PlayerComparison>): string {
  const body = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>Player Performance Before vs After Sunset</title>
      </head>
      <body>
        <SunsetDashboard results={results} />
      </body>
    </html>
  );
  return `<!DOCTYPE html>${body}`;
}

/**
 * Analyzes the store and writes the chart page
 *
 * @returns false when there is nothing to chart
 */
export function writeCharts(dbPath: string = cfg.database.path, outPath: string = cfg.report.chartPath): boolean {
  const db = openDatabase(dbPath);
  try {
    const results = analyzePlayerPerformance(db);
    if (results.size === 0) {
      logger.warn('No data available for visualization');
      return false;
    }
    writeFileSync(outPath, renderChartsHtml(results), 'utf-8');
    logger.info({ players: results.size, outPath }, 'Visualizations written');
    return true;
  } finally {
    db.close();
  }
}

// Run if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('charts.tsx')) {
  try {
    writeCharts();
  } catch (err) {
    logger.error({ err }, 'Visualization failed');
    process.exit(1);
  }
}
