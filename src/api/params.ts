import { z } from 'zod';
import type { BBox, Sample } from '../types/Location';
import { isValidDate } from '../utils/localDate';
import { parseWith } from '../utils/validation';

/**
 * Request parsing for the HTTP layer. Every parser throws ValidationError,
 * which the server turns into a 400.
 */

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

const INTEGER = /^-?\d+$/;

const decimal = (message: string) =>
  z
    .string()
    .trim()
    .min(1, message)
    .transform(Number)
    .pipe(z.number({ invalid_type_error: message }).finite(message));

/**
 * "swLon,swLat,neLon,neLat"
 */
const BBoxSchema = z
  .string({ required_error: 'bbox required', invalid_type_error: 'bbox required' })
  .min(1, 'bbox required')
  .transform((raw) => raw.split(','))
  .pipe(z.array(decimal('invalid bbox format')).length(4, 'invalid bbox format'))
  .transform(([swLon, swLat, neLon, neLat]): BBox => ({ swLat, swLon, neLat, neLon }));

export function parseBBox(value: unknown): BBox {
  return parseWith(BBoxSchema, queryString(value));
}

const timestamp = (field: string) =>
  z
    .string()
    .regex(INTEGER, `invalid ${field} timestamp`)
    .transform((raw) => parseInt(raw, 10));

export function parseOptionalTimestamp(value: unknown, field: string): number | undefined {
  return parseWith(timestamp(field).optional(), queryString(value));
}

export function parseRequiredTimestamp(value: unknown, field: string): number {
  const schema = z.string({ required_error: 'start and end timestamps required' }).pipe(timestamp(field));
  return parseWith(schema, queryString(value));
}

/**
 * Single "timestamp" query parameter in unix seconds
 */
export function parseTimestamp(value: unknown): number {
  const schema = z
    .string({ required_error: 'timestamp required' })
    .regex(INTEGER, 'invalid timestamp')
    .transform((raw) => parseInt(raw, 10));
  return parseWith(schema, queryString(value));
}

/**
 * Non-negative distance in meters; absent means 0 (stage disabled)
 */
export function parseMeters(value: unknown, field: string): number {
  const schema = decimal(`invalid ${field}`)
    .pipe(z.number().nonnegative(`${field} must not be negative`))
    .optional()
    .transform((meters) => meters ?? 0);
  return parseWith(schema, queryString(value));
}

export function parseStageOrder(value: unknown): string[] | undefined {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  return raw.split(',').map((stage) => stage.trim());
}

const DateSchema = z
  .string({ required_error: 'date must be YYYY-MM-DD' })
  .refine(isValidDate, 'date must be YYYY-MM-DD');

export function parseDate(value: unknown): string {
  return parseWith(DateSchema, queryString(value));
}

/**
 * GPSLogger "time": unix seconds or RFC 3339; anything else means now
 */
export function parseLoggerTime(value: unknown, now = Date.now()): number {
  const raw = queryString(value);
  if (raw !== undefined) {
    if (INTEGER.test(raw)) return parseInt(raw, 10);

    const ms = Date.parse(raw);
    if (!Number.isNaN(ms)) return Math.floor(ms / 1000);
  }
  return Math.floor(now / 1000);
}

const LOGGER_POSITION_MESSAGE = 'lat and lon are required';

const LoggerPositionSchema = z.object({
  lat: z.string({ required_error: LOGGER_POSITION_MESSAGE }).pipe(decimal(LOGGER_POSITION_MESSAGE)),
  lon: z.string({ required_error: LOGGER_POSITION_MESSAGE }).pipe(decimal(LOGGER_POSITION_MESSAGE)),
});

export function parseLoggerPosition(lat: unknown, lon: unknown): { lat: number; lon: number } {
  return parseWith(LoggerPositionSchema, { lat: queryString(lat), lon: queryString(lon) });
}

export type OwnTracksMessage =
  | { type: 'location'; sample: Omit<Sample, 'userId'> }
  | { type: 'ignored' };

const optionalFinite = z.number().finite().optional().catch(undefined);

const OwnTracksEnvelopeSchema = z.object(
  { _type: z.unknown() },
  { required_error: 'invalid json', invalid_type_error: 'invalid json' }
);

const LOCATION_MESSAGE = 'location requires numeric lat, lon and tst';
const requiredFinite = z
  .number({ required_error: LOCATION_MESSAGE, invalid_type_error: LOCATION_MESSAGE })
  .finite(LOCATION_MESSAGE);

const OwnTracksLocationSchema = z.object({
  lat: requiredFinite,
  lon: requiredFinite,
  tst: requiredFinite,
  tid: z.string().optional().catch(undefined),
  acc: optionalFinite,
  alt: optionalFinite,
  vel: optionalFinite,
});

/**
 * OwnTracks HTTP payload. Only "location" messages carry a sample.
 * https://owntracks.org/booklet/tech/json/
 */
export function parseOwnTracks(body: unknown): OwnTracksMessage {
  const envelope = parseWith(OwnTracksEnvelopeSchema, body);
  if (envelope._type !== 'location') {
    return { type: 'ignored' };
  }

  const location = parseWith(OwnTracksLocationSchema, body);
  const sample: Omit<Sample, 'userId'> = {
    timestamp: Math.floor(location.tst),
    deviceId: location.tid || 'owntracks',
    lat: location.lat,
    lon: location.lon,
    source: 'owntracks',
  };

  if (location.acc !== undefined) sample.accuracyMeters = location.acc;
  if (location.alt !== undefined) sample.altitudeMeters = location.alt;
  if (location.vel !== undefined) sample.speedKmh = location.vel;

  return { type: 'location', sample };
}
