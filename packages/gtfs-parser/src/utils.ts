import { InvalidInputError } from './errors.js';

const EARTH_RADIUS_KM = 6371;

/**
 * Calculate distance between two geographic points using Haversine formula
 * @returns Distance in kilometers
 */
export function calculateDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const φ1 = degreesToRadians(lat1);
  const φ2 = degreesToRadians(lat2);
  const Δφ = degreesToRadians(lat2 - lat1);
  const Δλ = degreesToRadians(lon2 - lon1);

  const a =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

/**
 * Convert degrees to radians
 */
export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a latitude or longitude typed by a user.
 * Accepts numbers and plain decimal strings; hex, binary and octal literals,
 * Infinity and NaN are rejected.
 */
export function parseCoordinate(value: number | string, label = 'coordinate'): number {
  const text = typeof value === 'number' ? String(value) : value.trim();
  const parsed = typeof value === 'number' ? value : DECIMAL.test(text) ? Number(text) : Number.NaN;

  if (!Number.isFinite(parsed)) {
    throw new InvalidInputError(`Invalid ${label}: "${text}"`, text);
  }
  return parsed;
}

/**
 * Route and stop ids compare case-insensitively; this is the canonical form.
 */
export function normalizeId(id: string): string {
  return id.trim().toUpperCase();
}

/**
 * Plain code-unit ordering, so "10" < "2" < "A"
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format Unix seconds as local time, e.g. "2024-05-27 08:15:30 PM"
 */
export function formatTimestamp(seconds: number): string {
  const date = new Date(seconds * 1000);
  const hours = date.getHours();
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;
  const suffix = hours < 12 ? 'AM' : 'PM';

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(hours12)}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ${suffix}`
  );
}

const DISPLAY_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) (AM|PM)$/;

/**
 * Inverse of formatTimestamp, to the second
 */
export function parseDisplayTimestamp(text: string): number {
  const match = DISPLAY_TIMESTAMP.exec(text.trim());
  if (!match) {
    throw new InvalidInputError(`Not a display timestamp: "${text}"`, text);
  }

  const [, year, month, day, hours12, minutes, seconds, suffix] = match;
  const hour12 = Number(hours12);
  if (hour12 < 1 || hour12 > 12) {
    throw new InvalidInputError(`Hour out of range in "${text}"`, text);
  }
  const hours = (hour12 % 12) + (suffix === 'PM' ? 12 : 0);

  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    hours,
    Number(minutes),
    Number(seconds)
  );
  return Math.floor(date.getTime() / 1000);
}
