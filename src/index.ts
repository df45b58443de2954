/**
 * NBA Sunset Stats - Collection Entry Point
 *
 * Seeds arenas, then runs the capped stats, game-detail and sun-time
 * collection loops repeatedly against the local SQLite store.
 */

import { logger } from './core/logger.js';
import { createStatsApiClient } from './http/statsApiClient.js';
import { createSunApiClient } from './http/sunApiClient.js';
import { runCollection } from './services/orchestrator.js';

runCollection({ stats: createStatsApiClient(), sun: createSunApiClient() })
  .then(summary => {
    logger.info({ totals: summary.totals }, 'Done');
  })
  .catch(err => {
    logger.error({ err }, 'Fatal error occurred');
    process.exit(1);
  });
