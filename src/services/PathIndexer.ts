import type { LocationStore } from '../db/LocationStore';
import type { Path, PathPoint, Sample } from '../types/Location';
import { localDateFromTimestamp } from '../utils/localDate';
import { createLogger } from '../utils/logger';

/**
 * Bucket key for one user on one local day
 */
export function pathKey(userId: string, date: string): string {
  return `${userId}|${date}`;
}

/**
 * Stable insertion sort by timestamp; batches are small and usually
 * arrive nearly ordered
 */
function sortPointsByTimestamp(points: PathPoint[]): void {
  for (let i = 1; i < points.length; i++) {
    const current = points[i];
    let j = i - 1;
    while (j >= 0 && points[j].timestamp > current.timestamp) {
      points[j + 1] = points[j];
      j--;
    }
    points[j + 1] = current;
  }
}

/**
 * Group samples by user and local date, accumulating each path's bounds
 */
export function computePaths(samples: Sample[]): Map<string, Path> {
  const paths = new Map<string, Path>();

  for (const sample of samples) {
    const date = localDateFromTimestamp(sample.timestamp, sample.lon);
    const key = pathKey(sample.userId, date);

    let path = paths.get(key);
    if (!path) {
      path = {
        userId: sample.userId,
        date,
        startTs: sample.timestamp,
        endTs: sample.timestamp,
        minLat: sample.lat,
        maxLat: sample.lat,
        minLon: sample.lon,
        maxLon: sample.lon,
        pointCount: 0,
        points: [],
      };
      paths.set(key, path);
    }

    path.startTs = Math.min(path.startTs, sample.timestamp);
    path.endTs = Math.max(path.endTs, sample.timestamp);
    path.minLat = Math.min(path.minLat, sample.lat);
    path.maxLat = Math.max(path.maxLat, sample.lat);
    path.minLon = Math.min(path.minLon, sample.lon);
    path.maxLon = Math.max(path.maxLon, sample.lon);

    path.points.push({ lat: sample.lat, lon: sample.lon, timestamp: sample.timestamp });
    path.pointCount++;
  }

  for (const path of paths.values()) {
    sortPointsByTimestamp(path.points);
  }

  return paths;
}

/**
 * Keeps the per-day path table in step with the sample table
 */
export class PathIndexer {
  private readonly logger = createLogger({ component: 'PathIndexer' });

  constructor(private readonly store: LocationStore) {}

  /**
   * Recompute the paths touched by new samples.
   *
   * Each affected day is rebuilt from every stored sample for that day,
   * so duplicate or out-of-order delivery converges to the same result.
   */
  updateForSamples(samples: Sample[]): number {
    if (samples.length === 0) return 0;

    const affected = new Map<string, { userId: string; date: string }>();
    for (const sample of samples) {
      const date = localDateFromTimestamp(sample.timestamp, sample.lon);
      affected.set(pathKey(sample.userId, date), { userId: sample.userId, date });
    }

    let updated = 0;
    for (const [key, { userId, date }] of affected) {
      const daySamples = this.store.querySamplesForUserDate(userId, date);
      const path = computePaths(daySamples).get(key);
      if (!path) continue;

      this.store.upsertPath(path);
      updated++;
    }

    this.logger.debug({ samples: samples.length, paths: updated }, 'Paths updated');
    return updated;
  }

  /**
   * Recompute every path from the full sample table. The old paths stay
   * visible until the new set is written in full.
   */
  rebuildAll(): number {
    const started = Date.now();

    const paths = computePaths(this.store.queryAllSamples());
    this.store.replaceAllPaths([...paths.values()]);

    this.logger.info({ paths: paths.size, durationMs: Date.now() - started }, 'Rebuilt all paths');
    return paths.size;
  }
}
