import { z } from 'zod';
import type { LocationStore } from '../db/LocationStore';
import type { Sample } from '../types/Location';
import { ValidationError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { parseWith } from '../utils/validation';
import type { PathIndexer } from './PathIndexer';

/**
 * Importer for Google/Android Timeline exports ("rawSignals" format)
 */

export const IMPORT_BATCH_SIZE = 1000;
export const DEFAULT_TIMELINE_DEVICE = 'google-timeline';

export interface TimelineImportStats {
  total: number;
  parsed: number;
  inserted: number;
  skipped: number;
  errors: number;
}

export interface ExtractResult {
  samples: Sample[];
  total: number;
  errors: string[];
}

function parseCoordinate(value: string, field: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed)) {
    throw new ValidationError(`invalid ${field}: ${value}`);
  }
  return parsed;
}

/**
 * Parse "37.422°, -122.084°" into [lat, lon]
 */
export function parseLatLng(value: string): [number, number] {
  const parts = value.replace(/°/g, '').split(',');
  if (parts.length !== 2) {
    throw new ValidationError(`invalid LatLng format: ${value}`);
  }
  return [parseCoordinate(parts[0], 'latitude'), parseCoordinate(parts[1], 'longitude')];
}

const EXPORT_MESSAGE = 'expected a timeline export with a rawSignals array';

const TimelineExportSchema = z.object(
  {
    rawSignals: z.array(z.unknown(), { required_error: EXPORT_MESSAGE, invalid_type_error: EXPORT_MESSAGE }),
  },
  { required_error: EXPORT_MESSAGE, invalid_type_error: EXPORT_MESSAGE }
);

// Signals without a position (activity, wifi scans) are not counted
const PositionSignalSchema = z.object({ position: z.record(z.unknown()) });

// Zero means "not recorded" in exports
const measurement = z
  .number()
  .finite()
  .optional()
  .catch(undefined)
  .transform((value) => (value === 0 ? undefined : value));

const PositionSchema = z.object({
  LatLng: z.string({ required_error: 'missing LatLng', invalid_type_error: 'missing LatLng' }),
  timestamp: z.unknown(),
  accuracyMeters: measurement,
  altitudeMeters: measurement,
  speedMetersPerSecond: measurement,
  source: z.string().optional().catch(undefined),
});

function parseSignalTimestamp(value: unknown): number {
  const ms = typeof value === 'string' ? Date.parse(value) : NaN;
  if (Number.isNaN(ms)) {
    throw new ValidationError(`invalid timestamp ${JSON.stringify(value)}`);
  }
  return Math.floor(ms / 1000);
}

/**
 * Convert every position signal into a sample. Signals that cannot be
 * parsed are reported by index and skipped.
 */
export function extractSamples(data: unknown, userId: string, deviceId = DEFAULT_TIMELINE_DEVICE): ExtractResult {
  const { rawSignals } = parseWith(TimelineExportSchema, data);

  const samples: Sample[] = [];
  const errors: string[] = [];
  let total = 0;

  rawSignals.forEach((signal, i) => {
    const located = PositionSignalSchema.safeParse(signal);
    if (!located.success) return;
    total++;

    try {
      const position = parseWith(PositionSchema, located.data.position);
      const [lat, lon] = parseLatLng(position.LatLng);

      const sample: Sample = {
        timestamp: parseSignalTimestamp(position.timestamp),
        userId,
        deviceId,
        lat,
        lon,
      };

      if (position.accuracyMeters !== undefined) sample.accuracyMeters = position.accuracyMeters;
      if (position.altitudeMeters !== undefined) sample.altitudeMeters = position.altitudeMeters;
      if (position.speedMetersPerSecond !== undefined) sample.speedKmh = position.speedMetersPerSecond * 3.6;
      if (position.source) sample.source = position.source;

      samples.push(sample);
    } catch (error) {
      errors.push(`signal ${i}: ${errorMessage(error)}`);
    }
  });

  return { samples, total, errors };
}

export class TimelineImporter {
  private readonly logger = createLogger({ component: 'TimelineImporter' });

  constructor(
    private readonly store: LocationStore,
    private readonly indexer: PathIndexer
  ) {}

  /**
   * Insert parsed samples in batches, updating the path index after each
   * batch that added anything
   */
  importExport(data: unknown, userId: string, deviceId = DEFAULT_TIMELINE_DEVICE): TimelineImportStats {
    const { samples, total, errors } = extractSamples(data, userId, deviceId);

    const stats: TimelineImportStats = {
      total,
      parsed: samples.length,
      inserted: 0,
      skipped: 0,
      errors: errors.length,
    };

    if (errors.length > 0) {
      this.logger.warn({ count: errors.length, first: errors[0] }, 'Some timeline signals could not be parsed');
    }

    for (let i = 0; i < samples.length; i += IMPORT_BATCH_SIZE) {
      const batch = samples.slice(i, i + IMPORT_BATCH_SIZE);
      const { inserted, skipped } = this.store.insertSamples(batch);
      stats.inserted += inserted;
      stats.skipped += skipped;

      if (inserted > 0) {
        this.indexer.updateForSamples(batch);
      }
    }

    this.logger.info({ ...stats }, 'Timeline import finished');
    return stats;
  }
}
