/**
 * Sunrise-Sunset API Client Module
 *
 * Looks up sunrise and sunset for a coordinate (and optionally a date)
 * at api.sunrise-sunset.org. With formatted=0 the service answers in
 * ISO 8601 with an explicit offset.
 */

import { cfg } from '../core/config.js';
import { ApiError } from '../errors/index.js';
import { httpGet } from '../util/http.js';
import { isValidCoordinate, isValidDateISO, isValidUrl, ValidationError } from '../util/validation.js';
import type { SunApiResponse } from '../types/api.js';

export interface SunTimes {
  sunrise: string;
  sunset: string;
}

export interface SunTimeQuery {
  latitude: number;
  longitude: number;
  date?: string; // YYYY-MM-DD, today when omitted
}

/**
 * What the sun-time loop needs from the provider
 *
 * Throws on any failure (transport error, HTTP error or a non-OK status).
 */
export interface SunTimeSource {
  fetchSunTimes(query: SunTimeQuery): Promise<SunTimes>;
}

function baseUrl(): string {
  const url = cfg.sunApi.baseUrl;
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid sun API URL: ${url}`, 'baseUrl');
  }
  return url;
}

/**
 * Validates a query and turns it into request params
 */
export function sunTimeParams(query: SunTimeQuery): Record<string, string | number> {
  if (!isValidCoordinate(query.latitude, query.longitude)) {
    throw new ValidationError(`Invalid coordinate: ${query.latitude}, ${query.longitude}`, 'coordinate');
  }
  const params: Record<string, string | number> = {
    lat: query.latitude,
    lng: query.longitude,
    formatted: 0
  };
  if (query.date !== undefined) {
    if (!isValidDateISO(query.date)) {
      throw new ValidationError(`Invalid date format: ${query.date}`, 'date');
    }
    params.date = query.date;
  }
  return params;
}

export function createSunApiClient(): SunTimeSource {
  return {
    async fetchSunTimes(query: SunTimeQuery): Promise<SunTimes> {
      const url = baseUrl();
      const res = await httpGet<SunApiResponse>(url, { params: sunTimeParams(query) });

      if (res.status !== 200 || !res.data) {
        throw new ApiError(`Sun API request failed with status ${res.status}`, url, res.status);
      }
      if (res.data.status !== 'OK') {
        throw new ApiError(`Sun API returned status ${res.data.status}`, url, res.status);
      }

      const { sunrise, sunset } = res.data.results;
      return { sunrise, sunset };
    }
  };
}
