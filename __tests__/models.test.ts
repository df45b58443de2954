import { describe, it, expect } from 'vitest';
import { summarize, type UnitResult } from '../src/models/results.js';

describe('summarize', () => {
  it('should count inserted and duplicate units and keep failure reasons', () => {
    const results: UnitResult[] = [
      { status: 'inserted', key: 1 },
      { status: 'duplicate', key: 2 },
      { status: 'inserted', key: 3 },
      { status: 'failed', key: 4, reason: 'timeout' }
    ];

    expect(summarize('stats', results)).toEqual({
      loop: 'stats',
      inserted: 2,
      duplicates: 1,
      failures: [{ key: 4, reason: 'timeout' }]
    });
  });

  it('should produce an empty summary for no units', () => {
    expect(summarize('gameSunTimes', [])).toEqual({ loop: 'gameSunTimes', inserted: 0, duplicates: 0, failures: [] });
  });
});
