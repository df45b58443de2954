/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

export { ValidationError } from '../errors/index.js';

/**
 * Validates a date string in ISO format (YYYY-MM-DD)
 *
 * @param dateISO - Date string to validate
 * @returns True if valid, false otherwise
 */
export function isValidDateISO(dateISO: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateISO)) {
    return false;
  }

  const [year, month, day] = dateISO.split('-').map(Number);

  // JavaScript Date is lenient ('2025-02-30' rolls over to March), so compare components
  const date = new Date(year, month - 1, day);
  return (
    !isNaN(date.getTime()) &&
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates a latitude/longitude pair in decimal degrees
 */
export function isValidCoordinate(latitude: number, longitude: number): boolean {
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Math.abs(latitude) <= 90 &&
    Math.abs(longitude) <= 180
  );
}
