/**
 * Ingestion Result Models
 *
 * Every unit of work an ingestion loop attempts ends in a UnitResult.
 * Loops fold their units into a LoopSummary; the orchestrator folds
 * loop outcomes into a RunSummary.
 */

export type LoopName = 'stats' | 'gameBackfill' | 'arenaSunTimes' | 'gameSunTimes';

/**
 * Outcome of one unit (a stat record, a game, an arena...)
 *
 * @template K - Identity of the unit (stat id, game id, arena id)
 */
export type UnitResult<K = number> =
  | { status: 'inserted'; key: K }
  | { status: 'duplicate'; key: K }
  | { status: 'failed'; key: K; reason: string };

export interface UnitFailure<K = number> {
  key: K;
  reason: string;
}

export interface LoopSummary<K = number> {
  loop: LoopName;
  /** New rows written (or, for the backfill, games updated) */
  inserted: number;
  /** Units skipped because their identity was already stored */
  duplicates: number;
  failures: UnitFailure<K>[];
}

/**
 * Result of running one loop inside the orchestrator
 */
export type LoopOutcome =
  | { loop: LoopName; status: 'ok'; summary: LoopSummary }
  | { loop: LoopName; status: 'error'; error: string };

export type SeedOutcome =
  | { status: 'seeded'; rows: number }
  | { status: 'skipped'; reason: string }
  | { status: 'error'; error: string };

export interface RunReport {
  run: number;
  loops: LoopOutcome[];
}

export interface RunSummary {
  seed: SeedOutcome;
  runs: RunReport[];
  totals: Record<LoopName, number> & { errors: number };
}

/**
 * Folds unit results into a loop summary
 */
export function summarize<K>(loop: LoopName, results: UnitResult<K>[]): LoopSummary<K> {
  const summary: LoopSummary<K> = { loop, inserted: 0, duplicates: 0, failures: [] };
  for (const result of results) {
    switch (result.status) {
      case 'inserted':
        summary.inserted++;
        break;
      case 'duplicate':
        summary.duplicates++;
        break;
      case 'failed':
        summary.failures.push({ key: result.key, reason: result.reason });
        break;
    }
  }
  return summary;
}
