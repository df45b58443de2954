/**
 * Database Migration Runner
 *
 * Runs SQL migration files in order to set up the database schema,
 * then loads the team lookup.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../core/logger.js';
import { cfg } from '../core/config.js';
import { DatabaseError, toError } from '../errors/index.js';
import { seedTeams } from './repositories/teams.js';
import type { TeamRow } from './types.js';
import type { SqliteDb } from './client.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// When running from dist/src/db/migrate.js the .sql files are not copied,
// so fall back to the app root (cwd) like the start script expects
const isDist = __dirname.includes('/dist/');
const migrationsDir = isDist
  ? join(process.cwd(), 'src/db/migrations')
  : join(__dirname, 'migrations');
const dataDir = isDist
  ? join(process.cwd(), 'data')
  : join(__dirname, '../../data');

const MIGRATIONS = [
  '001_initial_schema.sql',
  '002_arenas_and_daylight.sql',
  '003_teams.sql'
];

function isTeamRow(value: unknown): value is TeamRow {
  if (typeof value !== 'object' || value === null) return false;
  const row: Record<string, unknown> = { ...value };
  return (
    typeof row.team_id === 'number' &&
    typeof row.abbreviation === 'string' &&
    typeof row.city === 'string' &&
    typeof row.name === 'string' &&
    typeof row.full_name === 'string'
  );
}

/**
 * Reads the bundled team lookup
 */
export function loadTeams(): TeamRow[] {
  const raw = readFileSync(join(dataDir, 'teams.json'), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new DatabaseError('teams.json must contain an array', 'loadTeams');
  }
  return parsed.filter(isTeamRow);
}

/**
 * Runs all migration files in order
 *
 * Every statement is written with IF NOT EXISTS, so this is safe on each open.
 */
export function runMigrations(db: SqliteDb): void {
  for (const migrationFile of MIGRATIONS) {
    const migrationPath = join(migrationsDir, migrationFile);
    try {
      const sql = readFileSync(migrationPath, 'utf-8');
      db.exec(sql);
      logger.debug({ migration: migrationFile }, 'Migration applied successfully');
    } catch (err) {
      const error = toError(err);
      logger.error({ err, migration: migrationFile }, 'Failed to run migration');
      throw new DatabaseError(`Failed to run migration ${migrationFile}: ${error.message}`, 'migrate', error);
    }
  }

  const seeded = seedTeams(db, loadTeams());
  logger.debug({ seeded }, 'All database migrations completed successfully');
}

// Run migrations if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.includes('migrate.ts')) {
  const { openDatabase } = await import('./client.js');
  try {
    openDatabase(cfg.database.path).close();
    logger.info({ path: cfg.database.path }, 'Migrations completed');
  } catch (err) {
    logger.error({ err }, 'Migration failed');
    process.exit(1);
  }
}
