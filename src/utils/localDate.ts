/**
 * Local calendar dates from a longitude-based timezone estimate.
 *
 * Each 15 degrees of longitude is one hour from UTC. This is an
 * approximation: samples close to local midnight can land on a neighbouring
 * day compared to the real timezone.
 */

const SECONDS_PER_HOUR = 3600;

export function timezoneOffsetHours(lon: number): number {
  const offset = Math.round(lon / 15);
  return Math.min(14, Math.max(-12, offset));
}

/**
 * YYYY-MM-DD for a unix timestamp at the given longitude
 */
export function localDateFromTimestamp(timestamp: number, lon: number): string {
  const shifted = (timestamp + timezoneOffsetHours(lon) * SECONDS_PER_HOUR) * 1000;
  return new Date(shifted).toISOString().slice(0, 10);
}

/**
 * Unix seconds at UTC midnight of a YYYY-MM-DD date, or NaN if malformed
 */
export function utcMidnight(date: string): number {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return Number.NaN;
  return Date.parse(`${date}T00:00:00Z`) / 1000;
}

export function isValidDate(date: string): boolean {
  return !Number.isNaN(utcMidnight(date));
}
