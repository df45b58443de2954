/**
 * Sunset Classification
 *
 * Decides whether a game tipped off before or after local sunset.
 * Game times are stored as UTC clock times; the sunset timestamp's own
 * offset converts them to local time (UTC-5 when the sunset has no usable
 * offset). Only clock times are compared: the calendar date is ignored,
 * so a conversion that crosses midnight is compared against the same
 * clock-day's sunset.
 */

import { SUNSET } from '../core/constants.js';

export type SunsetCategory = 'before_sunset' | 'after_sunset';

const DAY_MS = 24 * 60 * 60 * 1000;

const CLOCK = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?Z?$/;
const TIMESTAMP = /T(\d{2}:\d{2}(?::\d{2}(?:\.\d{1,6})?)?)(Z|[+-]\d{2}:?\d{2})?$/;

export interface ParsedTimestamp {
  /** Milliseconds since local midnight, in the timestamp's own offset */
  clockMs: number;
  /** Offset from UTC in minutes, null when the timestamp carries none */
  offsetMinutes: number | null;
}

/**
 * Parses a clock time such as "19:00", "19:00:00" or "19:00:00.000"
 *
 * @returns milliseconds since midnight, or null when unparseable
 */
export function parseClockTime(value: string): number | null {
  const m = CLOCK.exec(value.trim());
  if (!m) return null;
  const [, hh, mm, ss = '0', frac = '0'] = m;
  const hours = Number(hh);
  const minutes = Number(mm);
  const seconds = Number(ss);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  const millis = Math.floor(Number(`0.${frac}`) * 1000);
  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
}

function parseOffset(value: string | undefined): number | null {
  if (value === undefined) return null;
  if (value === 'Z') return 0;
  const sign = value.startsWith('-') ? -1 : 1;
  const digits = value.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parses an ISO 8601 timestamp such as "2023-01-05T18:45:00-05:00"
 */
export function parseTimestamp(value: string): ParsedTimestamp | null {
  const m = TIMESTAMP.exec(value.trim());
  if (!m) return null;
  const clockMs = parseClockTime(m[1]);
  if (clockMs === null) return null;
  return { clockMs, offsetMinutes: parseOffset(m[2]) };
}

/**
 * Offset used to localize a game time: the sunset's own, or UTC-5 when it has none
 *
 * A zero offset counts as none.
 */
export function effectiveOffsetMinutes(sunset: ParsedTimestamp): number {
  return sunset.offsetMinutes ? sunset.offsetMinutes : SUNSET.FALLBACK_OFFSET_MINUTES;
}

/**
 * Converts a stored UTC clock time to local clock time (wrapping around midnight)
 */
export function toLocalClockMs(utcClockMs: number, offsetMinutes: number): number {
  return (((utcClockMs + offsetMinutes * 60_000) % DAY_MS) + DAY_MS) % DAY_MS;
}

/**
 * Classifies a game from its stored UTC start time and the sunset timestamp for its arena and date
 *
 * @example
 * classifyGame('19:00:00.000', '2023-01-05T18:45:00-05:00') // 'before_sunset' (14:00 local < 18:45)
 *
 * @returns null when either value cannot be parsed
 */
export function classifyGame(gameTimeUtc: string, sunset: string): SunsetCategory | null {
  const gameMs = parseClockTime(gameTimeUtc);
  const parsedSunset = parseTimestamp(sunset);
  if (gameMs === null || parsedSunset === null) return null;

  const localMs = toLocalClockMs(gameMs, effectiveOffsetMinutes(parsedSunset));
  return localMs < parsedSunset.clockMs ? 'before_sunset' : 'after_sunset';
}
