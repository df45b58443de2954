/**
 * Coordinate Resolver
 *
 * Turns the text of a Wikipedia location cell into decimal latitude and
 * longitude. Patterns are tried in order; the first that yields a valid
 * pair wins.
 */

import * as cheerio from 'cheerio';
import { isValidCoordinate } from '../util/validation.js';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Text pulled out of a location cell
 *
 * - geoDec: contents of span.geo-dec, e.g. "40.7506°N 73.9935°W"
 * - geo: contents of span.geo, e.g. "40.7506; -73.9935"
 * - text: all visible text of the cell
 */
export interface LocationFields {
  geoDec: string | null;
  geo: string | null;
  text: string;
}

export interface CoordinateStrategy {
  name: string;
  resolve(fields: LocationFields): Coordinates | null;
}

/**
 * Parses one decimal or degree-minute-second token into signed decimal degrees
 *
 * @example
 * tokenToDecimal('73.9935°W')        // -73.9935
 * tokenToDecimal('40°45′02″N')       // 40.75055...
 * tokenToDecimal('−118.267')         // -118.267
 */
export function tokenToDecimal(raw: string): number | null {
  const token = raw.trim().replace(/−/g, '-');
  const direction = /([NSEW])/i.exec(token)?.[1]?.toUpperCase() ?? null;
  const nums = token.match(/\d+(?:\.\d+)?/g);
  if (!nums) return null;

  let value =
    nums.length >= 3
      ? Number(nums[0]) + Number(nums[1]) / 60 + Number(nums[2]) / 3600
      : Number(nums[0]);
  if (!Number.isFinite(value)) return null;

  if (direction === 'S' || direction === 'W') value = -Math.abs(value);
  if (token.startsWith('-')) value = -Math.abs(value);
  return value;
}

function pair(latitude: number | null, longitude: number | null): Coordinates | null {
  if (latitude === null || longitude === null) return null;
  return isValidCoordinate(latitude, longitude) ? { latitude, longitude } : null;
}

function strictNumber(value: string): number | null {
  if (value.trim() === '') return null;
  const n = Number(value.trim().replace(/−/g, '-'));
  return Number.isFinite(n) ? n : null;
}

const geoDecSpan: CoordinateStrategy = {
  name: 'geo-dec',
  resolve({ geoDec }) {
    if (!geoDec) return null;
    const values = geoDec
      .split(/\s+/)
      .map(tokenToDecimal)
      .filter((v): v is number => v !== null);
    return values.length >= 2 ? pair(values[0], values[1]) : null;
  }
};

const geoSpan: CoordinateStrategy = {
  name: 'geo',
  resolve({ geo }) {
    if (!geo) return null;
    const parts = geo.includes(';')
      ? geo.split(';')
      : geo.includes(',')
        ? geo.split(',')
        : geo.trim().split(/\s+/);
    if (parts.length < 2) return null;

    const direct = pair(strictNumber(parts[0]), strictNumber(parts[1]));
    return direct ?? pair(tokenToDecimal(parts[0]), tokenToDecimal(parts[1]));
  }
};

const compassText: CoordinateStrategy = {
  name: 'decimal-with-compass',
  resolve({ text }) {
    const matches = [...text.matchAll(/([+-]?\d+(?:\.\d+)?)\s*°?\s*([NSEW])\b/gi)];
    if (matches.length < 2) return null;
    const [lat, lon] = matches.slice(0, 2).map(([, num, dir]) => {
      const v = Number(num);
      return dir.toUpperCase() === 'S' || dir.toUpperCase() === 'W' ? -Math.abs(v) : v;
    });
    return pair(lat, lon);
  }
};

const bareDecimals: CoordinateStrategy = {
  name: 'decimal-pair',
  resolve({ text }) {
    const nums = text.match(/[+-]?\d+\.\d+|[+-]?\d+/g);
    if (!nums || nums.length < 2) return null;
    return pair(Number(nums[0]), Number(nums[1]));
  }
};

/**
 * Patterns tried by resolveCoordinates, most specific first
 */
export const COORDINATE_STRATEGIES: readonly CoordinateStrategy[] = [geoDecSpan, geoSpan, compassText, bareDecimals];

export function resolveCoordinates(
  fields: LocationFields,
  strategies: readonly CoordinateStrategy[] = COORDINATE_STRATEGIES
): Coordinates | null {
  for (const strategy of strategies) {
    const found = strategy.resolve(fields);
    if (found) return found;
  }
  return null;
}

/**
 * Extracts location fields from an HTML fragment (a table cell or a whole page)
 */
export function locationFieldsFromHtml(html: string): LocationFields {
  const $ = cheerio.load(html);
  const geoDec = $('span.geo-dec').first();
  const geo = $('span.geo').first();
  return {
    geoDec: geoDec.length ? geoDec.text().trim() : null,
    geo: geo.length ? geo.text().trim() : null,
    text: $.root().text().replace(/\s+/g, ' ').trim()
  };
}

/**
 * Resolves coordinates from the geo spans of an arena's own article page
 *
 * Only the geo/geo-dec spans are considered: the rest of an article is full of unrelated numbers.
 */
export function resolveCoordinatesFromPage(html: string): Coordinates | null {
  const fields = locationFieldsFromHtml(html);
  return resolveCoordinates({ ...fields, text: '' }, [geoSpan, geoDecSpan]);
}
