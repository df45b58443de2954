/**
 * Arena Seed Service
 *
 * Copies the arenas table from a secondary SQLite file (the one the arena
 * scraper writes) into the main store, once: nothing happens when the
 * main store already has arenas.
 */

import { existsSync } from 'fs';
import { logger } from '../core/logger.js';
import { openDatabase, type SqliteDb } from '../db/client.js';
import { countArenas, upsertArena, type ArenaInput } from '../db/repositories/arenas.js';
import type { SeedOutcome } from '../models/results.js';

export function seedArenasFromSource(db: SqliteDb, sourcePath: string): SeedOutcome {
  const existing = countArenas(db);
  if (existing > 0) {
    logger.debug({ existing }, 'Arenas already present, skipping seed');
    return { status: 'skipped', reason: `arenas table already has ${existing} rows` };
  }
  if (!existsSync(sourcePath)) {
    logger.warn({ sourcePath }, 'Arena seed database not found');
    return { status: 'skipped', reason: `seed database ${sourcePath} not found` };
  }

  const source = openDatabase(sourcePath, { readonly: true, fileMustExist: true });
  try {
    const rows = source
      .prepare<[], ArenaInput>(`
        SELECT arena_name, team, city, latitude, longitude
        FROM arenas
        WHERE arena_name IS NOT NULL AND arena_name <> ''
        ORDER BY id
      `)
      .all();

    const copyAll = db.transaction((arenas: ArenaInput[]) => {
      for (const arena of arenas) upsertArena(db, arena);
    });
    copyAll(rows);

    logger.info({ rows: rows.length, sourcePath }, 'Arena table seeded');
    return { status: 'seeded', rows: rows.length };
  } finally {
    source.close();
  }
}
