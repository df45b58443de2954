/**
 * NBA Arena Scraper
 *
 * Reads the arena table of the Wikipedia "List of NBA arenas" page and
 * stores one row per arena (name, team, city, coordinates) in the arena
 * seed database. Arenas whose location cell carries no coordinates are
 * looked up on their own article page. The stored rows are also exported
 * to CSV.
 */

import { writeFileSync } from 'fs';
import * as cheerio from 'cheerio';
import Papa from 'papaparse';
import { cfg } from '../core/config.js';
import { HTTP, PACING } from '../core/constants.js';
import { logger } from '../core/logger.js';
import { openDatabase, type SqliteDb } from '../db/client.js';
import { listArenas, upsertArena, type ArenaInput } from '../db/repositories/arenas.js';
import { ScrapeError, toError } from '../errors/index.js';
import { httpGet, sleep } from '../util/http.js';
import {
  locationFieldsFromHtml,
  resolveCoordinates,
  resolveCoordinatesFromPage
} from './coordinates.js';

/**
 * One table row, before any article page is consulted
 */
export interface ArenaTableRow extends ArenaInput {
  link: string | null; // absolute URL of the arena's article, if linked
}

export type FetchHtml = (url: string) => Promise<string | null>;

export interface ScrapeOptions {
  fetchHtml?: FetchHtml;
  delayMs?: number;
}

const clean = (text: string): string => text.replace(/\s+/g, ' ').trim();

/**
 * Fetches a page with a browser-like User-Agent; non-200 responses yield null
 */
export async function fetchHtml(url: string): Promise<string | null> {
  const res = await httpGet<string>(url, { headers: { 'User-Agent': HTTP.USER_AGENT } });
  if (res.status !== 200 || typeof res.data !== 'string') {
    return null;
  }
  return res.data;
}

/**
 * Parses the arena table out of the list page
 *
 * The first `table.wikitable` whose header mentions both "arena" and "team"
 * is used; arena, team and location columns are found by header text.
 *
 * @throws ScrapeError when no such table or column exists
 */
export function parseArenaTable(html: string, pageUrl: string): ArenaTableRow[] {
  const $ = cheerio.load(html);

  const found = $('table.wikitable')
    .toArray()
    .map(table => ({
      table,
      headers: $(table).find('tr').first().find('th').toArray().map(th => clean($(th).text()).toLowerCase())
    }))
    .find(({ headers }) => {
      const header = headers.join(' ');
      return header.includes('arena') && header.includes('team');
    });
  if (!found) {
    throw new ScrapeError('Could not find NBA arenas table on the page', pageUrl);
  }

  const { table, headers } = found;
  const arenaIdx = headers.findIndex(h => h.includes('arena'));
  const teamIdx = headers.findIndex(h => h.includes('team'));
  const locationIdx = headers.findIndex(h => h.includes('location') || h.includes('city'));
  if (arenaIdx < 0 || teamIdx < 0 || locationIdx < 0) {
    throw new ScrapeError('Could not find Arena/Team/Location columns in the table header', pageUrl);
  }
  const widest = Math.max(arenaIdx, teamIdx, locationIdx);

  const rows: ArenaTableRow[] = [];
  $(table)
    .find('tr')
    .slice(1)
    .each((_, tr) => {
      const cells = $(tr).children('td, th');
      if (cells.length <= widest) return;

      const arenaCell = cells.eq(arenaIdx);
      const arenaName = clean(arenaCell.text());
      if (!arenaName) return;

      const locationCell = cells.eq(locationIdx);
      const locationText = clean(locationCell.text());
      const coords = resolveCoordinates(locationFieldsFromHtml(locationCell.html() ?? ''));
      const href = arenaCell.find('a').first().attr('href');

      rows.push({
        arena_name: arenaName,
        team: clean(cells.eq(teamIdx).text()),
        city: locationText.split(',')[0].trim(),
        latitude: coords?.latitude ?? null,
        longitude: coords?.longitude ?? null,
        link: href ? new URL(href, pageUrl).toString() : null
      });
    });

  return rows;
}

/**
 * Scrapes the arena list, following article links for arenas without coordinates
 */
export async function scrapeArenas(url: string = cfg.arenas.url, options: ScrapeOptions = {}): Promise<ArenaInput[]> {
  const { fetchHtml: fetchPage = fetchHtml, delayMs = PACING.ARENA_PAGE_DELAY_MS } = options;

  const html = await fetchPage(url);
  if (html === null) {
    throw new ScrapeError('Failed to fetch arena list page', url);
  }

  const arenas: ArenaInput[] = [];
  for (const { link, ...arena } of parseArenaTable(html, url)) {
    if ((arena.latitude === null || arena.longitude === null) && link) {
      await sleep(delayMs);
      try {
        const page = await fetchPage(link);
        const coords = page === null ? null : resolveCoordinatesFromPage(page);
        if (coords) {
          arena.latitude = coords.latitude;
          arena.longitude = coords.longitude;
        }
      } catch (err) {
        logger.warn({ err: toError(err), arena: arena.arena_name, link }, 'Failed to fetch arena page');
      }
    }
    arenas.push(arena);
  }

  logger.info({ arenas: arenas.length }, 'Arena table scraped');
  return arenas;
}

/**
 * Upserts every scraped arena by name
 */
export function storeArenas(db: SqliteDb, arenas: ArenaInput[]): { inserted: number; updated: number } {
  let inserted = 0;
  let updated = 0;
  db.transaction(() => {
    for (const arena of arenas) {
      if (upsertArena(db, arena) === 'inserted') inserted++;
      else updated++;
    }
  })();
  return { inserted, updated };
}

const CSV_FIELDS = ['arena_name', 'team', 'city', 'latitude', 'longitude'] as const;

/**
 * Renders arenas as CSV with a header row (CRLF line endings, empty cells for missing values)
 */
export function arenasToCsv(arenas: ArenaInput[]): string {
  return Papa.unparse({
    fields: [...CSV_FIELDS],
    data: arenas.map(arena => CSV_FIELDS.map(field => arena[field]))
  });
}

/**
 * Numbered `idx|name|team|city|lat|lon` lines, starting at 1
 */
export function formatArenaListing(arenas: ArenaInput[]): string[] {
  return arenas.map((arena, i) =>
    [i + 1, ...CSV_FIELDS.map(field => arena[field] ?? '')].join('|')
  );
}

// Run if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('arenaScraper.ts')) {
  try {
    const arenas = await scrapeArenas();
    const db = openDatabase(cfg.arenas.seedDbPath);
    try {
      const stored = storeArenas(db, arenas);
      logger.info({ ...stored, path: cfg.arenas.seedDbPath }, 'Arenas stored');

      const rows = listArenas(db);
      writeFileSync(cfg.arenas.csvPath, arenasToCsv(rows), 'utf-8');
      logger.info({ rows: rows.length, path: cfg.arenas.csvPath }, 'Arenas exported');
      for (const line of formatArenaListing(rows)) {
        logger.info(line);
      }
    } finally {
      db.close();
    }
  } catch (err) {
    logger.error({ err }, 'Arena scrape failed');
    process.exit(1);
  }
}
