/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration constants.
 */

/**
 * Per-invocation ceilings for the ingestion loops
 */
export const INGESTION_LIMITS = {
  /** Default number of new rows a single loop invocation may write */
  DEFAULT_CAP: 25,

  /** The stats API serves at most 25 records per call in this setup */
  MAX_PER_PAGE: 25,
} as const;

/**
 * Cooperative rate limiting (in milliseconds)
 */
export const PACING = {
  /** Pause after every successful sunrise-sunset call */
  SUN_API_DELAY_MS: 500,

  /** Pause before following an arena link on Wikipedia */
  ARENA_PAGE_DELAY_MS: 500,

  /** Pause between orchestrator runs */
  RUN_DELAY_MS: 2000,
} as const;

/**
 * Sunset classification
 */
export const SUNSET = {
  /** Offset applied to stored UTC tip-off times when the sunset carries none (UTC-5) */
  FALLBACK_OFFSET_MINUTES: -300,

  /** Point swing above which the report calls out a direction */
  NOTABLE_POINTS_DIFF: 2,
} as const;

/**
 * HTTP settings
 */
export const HTTP = {
  /** Request timeout for all outbound calls */
  TIMEOUT_MS: 15000,

  /** Browser-like agent for Wikipedia requests */
  USER_AGENT:
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/115.0.0.0 Safari/537.36',
} as const;
