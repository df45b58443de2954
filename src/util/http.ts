/**
 * HTTP Utility Module
 *
 * Thin axios wrapper shared by the API clients and the arena scraper.
 * HTTP error statuses are returned, not thrown, so callers decide how a
 * failed page or lookup is handled.
 */

import axios from 'axios';
import { ApiError, toError } from '../errors/index.js';
import { logger } from '../core/logger.js';
import { HTTP } from '../core/constants.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data?: T; // Response body (parsed JSON, or the raw string for HTML)
}

export interface HttpGetOptions {
  params?: Record<string, unknown>;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Performs an HTTP GET request
 *
 * - Never throws on HTTP errors (validateStatus: () => true)
 * - Array params are serialized as `key[]=a&key[]=b`
 * - Transport failures (DNS, timeout, reset) throw ApiError with status 0
 *
 * @example
 * const res = await httpGet<StatsPage>('https://api.balldontlie.io/v1/stats', {
 *   params: { 'player_ids': [15, 46], per_page: 25 },
 *   headers: { Authorization: 'test-key' }
 * });
 */
export async function httpGet<T>(url: string, options: HttpGetOptions = {}): Promise<HttpResponse<T>> {
  const { params, headers = {}, timeoutMs = HTTP.TIMEOUT_MS } = options;
  try {
    const res = await axios.get<T>(url, { params, headers, timeout: timeoutMs, validateStatus: () => true });

    // Log errors for non-2xx responses
    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }

    return { status: res.status, data: res.data };
  } catch (err) {
    const error = toError(err);
    throw new ApiError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}

/**
 * Resolves after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
