import { describe, it, expect } from 'vitest';
import { HTTP, INGESTION_LIMITS, PACING, SUNSET } from '../src/core/constants.js';

describe('constants', () => {
  it('should cap ingestion at 25 rows and 25 records per page', () => {
    expect(INGESTION_LIMITS.DEFAULT_CAP).toBe(25);
    expect(INGESTION_LIMITS.MAX_PER_PAGE).toBe(25);
  });

  it('should have all required pacing delays', () => {
    expect(PACING.SUN_API_DELAY_MS).toBe(500);
    expect(PACING.ARENA_PAGE_DELAY_MS).toBe(500);
    expect(PACING.RUN_DELAY_MS).toBe(2000);
  });

  it('should fall back to UTC-5 and call out swings above 2 points', () => {
    expect(SUNSET.FALLBACK_OFFSET_MINUTES).toBe(-300);
    expect(SUNSET.NOTABLE_POINTS_DIFF).toBe(2);
  });

  it('should send a browser-like user agent', () => {
    expect(HTTP.TIMEOUT_MS).toBe(15000);
    expect(HTTP.USER_AGENT.startsWith('Mozilla/5.0')).toBe(true);
  });
});
