import type { LocationStore } from '../db/LocationStore';
import type { PathPoint, PhotoLocation, StationaryCluster } from '../types/Location';
import type { Timeline, TimelineEntry } from '../types/Timeline';
import { distanceMeters } from '../utils/geometry';
import { thumbnailUrl } from '../utils/photoClusters';
import { pruneStationaryPoints } from '../utils/stationaryPruner';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { PlaceResolver } from './NominatimGeocoder';

// Fixed policy so identical input always yields the same timeline
export const STOP_RADIUS_METERS = 50;
export const MERGE_DISTANCE_METERS = 500;
export const MERGE_MAX_GAP_SECONDS = 30 * 60;
export const MIN_STOP_DURATION_SECONDS = 10 * 60;
export const MIN_TRAVEL_DURATION_SECONDS = 60;
export const PHOTO_BUFFER_SECONDS = 5 * 60;

/**
 * A stationary cluster whose position may drift from its anchor once merged
 */
export interface MergedCluster {
  lat: number;
  lon: number;
  startTs: number;
  endTs: number;
  pointCount: number;
}

/**
 * Merge neighbouring clusters that are close in both space and time.
 * Each cluster is compared only with the most recent merged cluster;
 * positions combine as a point-count weighted average.
 */
export function mergeClusters(
  clusters: StationaryCluster[],
  maxDistanceMeters = MERGE_DISTANCE_METERS,
  maxGapSeconds = MERGE_MAX_GAP_SECONDS
): MergedCluster[] {
  const merged: MergedCluster[] = [];

  for (const cluster of clusters) {
    const last = merged[merged.length - 1];
    if (
      last &&
      distanceMeters(last, cluster) <= maxDistanceMeters &&
      cluster.startTs - last.endTs <= maxGapSeconds
    ) {
      const total = last.pointCount + cluster.pointCount;
      last.lat = (last.lat * last.pointCount + cluster.lat * cluster.pointCount) / total;
      last.lon = (last.lon * last.pointCount + cluster.lon * cluster.pointCount) / total;
      last.endTs = cluster.endTs;
      last.pointCount = total;
    } else {
      merged.push({ ...cluster });
    }
  }

  return merged;
}

/**
 * Path length over the raw points inside [start, end]
 */
export function travelDistance(points: PathPoint[], start: number, end: number): number {
  let distance = 0;
  let previous: PathPoint | undefined;

  for (const point of points) {
    if (point.timestamp < start || point.timestamp > end) continue;
    if (previous) {
      distance += distanceMeters(previous, point);
    }
    previous = point;
  }

  return distance;
}

/**
 * Turn one day's ordered points into alternating stop and travel entries
 */
export function buildEntries(points: PathPoint[], photos: PhotoLocation[] = []): TimelineEntry[] {
  const { clusters } = pruneStationaryPoints(points, STOP_RADIUS_METERS);
  const stops = mergeClusters(clusters).filter(
    (cluster) => cluster.endTs - cluster.startTs >= MIN_STOP_DURATION_SECONDS
  );

  const entries: TimelineEntry[] = [];

  stops.forEach((stop, i) => {
    const previous = stops[i - 1];
    if (previous) {
      const travelStart = previous.endTs;
      const travelEnd = stop.startTs;
      const duration = travelEnd - travelStart;

      if (duration > MIN_TRAVEL_DURATION_SECONDS) {
        entries.push({
          type: 'travel',
          timestamp: travelStart,
          endTimestamp: travelEnd,
          lat: previous.lat,
          lon: previous.lon,
          endLat: stop.lat,
          endLon: stop.lon,
          durationSeconds: duration,
          distanceMeters: travelDistance(points, travelStart, travelEnd),
        });
      }
    }

    const entry: TimelineEntry = {
      type: 'stop',
      timestamp: stop.startTs,
      endTimestamp: stop.endTs,
      lat: stop.lat,
      lon: stop.lon,
      durationSeconds: stop.endTs - stop.startTs,
    };

    const stopPhotos = photos.filter(
      (photo) =>
        photo.timestamp >= stop.startTs - PHOTO_BUFFER_SECONDS &&
        photo.timestamp <= stop.endTs + PHOTO_BUFFER_SECONDS
    );
    if (stopPhotos.length > 0) {
      entry.photos = stopPhotos.map((photo) => ({
        sourceId: photo.sourceId,
        thumbnailUrl: thumbnailUrl(photo.sourceId),
        filename: photo.filename,
      }));
    }

    entries.push(entry);
  });

  return entries;
}

/**
 * Builds a day timeline of stops and travel for a user
 */
export class TimelineBuilder {
  private readonly logger = createLogger({ component: 'TimelineBuilder' });

  constructor(
    private readonly store: LocationStore,
    private readonly places?: PlaceResolver
  ) {}

  async build(userId: string, date: string): Promise<Timeline> {
    const samples = this.store.querySamplesForUserDate(userId, date);
    if (samples.length === 0) {
      return { date, entries: [] };
    }

    const points: PathPoint[] = samples.map((s) => ({ lat: s.lat, lon: s.lon, timestamp: s.timestamp }));
    // samples come back ordered by timestamp
    const startTs = points[0].timestamp;
    const endTs = points[points.length - 1].timestamp;

    const photos = this.store.queryPhotoLocations(startTs, endTs);
    const entries = buildEntries(points, photos);

    await this.attachPlaceNames(entries);

    this.logger.debug({ userId, date, samples: samples.length, entries: entries.length }, 'Timeline built');
    return { date, entries };
  }

  /**
   * Geocode stop positions only; results map back by index
   */
  private async attachPlaceNames(entries: TimelineEntry[]): Promise<void> {
    if (!this.places) return;

    const stopIndices: number[] = [];
    entries.forEach((entry, i) => {
      if (entry.type === 'stop') stopIndices.push(i);
    });
    if (stopIndices.length === 0) return;

    try {
      const resolved = await this.places.reverseGeocodeBatch(
        stopIndices.map((i) => ({ lat: entries[i].lat, lon: entries[i].lon }))
      );
      stopIndices.forEach((entryIndex, geoIndex) => {
        const place = resolved.get(geoIndex);
        if (place) {
          entries[entryIndex].placeName = place.placeName;
        }
      });
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Place lookup failed, returning timeline without names');
    }
  }
}
