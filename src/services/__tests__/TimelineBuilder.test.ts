import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TimelineBuilder, buildEntries, mergeClusters, travelDistance } from '../TimelineBuilder';
import type { PlaceResolver } from '../NominatimGeocoder';
import { SqliteLocationStore } from '../../db/SqliteLocationStore';
import type { PathPoint, PhotoLocation, StationaryCluster } from '../../types/Location';

const point = (timestamp: number, lon: number, lat = 0): PathPoint => ({ lat, lon, timestamp });

/**
 * Two 15-minute stops on the equator joined by three travel fixes.
 * 0.005 degrees of longitude is ~556m, so no neighbours merge.
 */
function dayOfPoints(base = 0): PathPoint[] {
  const points: PathPoint[] = [];
  for (let t = 0; t <= 900; t += 60) points.push(point(base + t, 0));
  points.push(point(base + 960, 0.005), point(base + 1020, 0.01), point(base + 1080, 0.015));
  for (let t = 1140; t <= 2040; t += 60) points.push(point(base + t, 0.02));
  return points;
}

describe('mergeClusters', () => {
  const cluster = (lat: number, startTs: number, endTs: number, pointCount = 10): StationaryCluster => ({
    lat,
    lon: 0,
    startTs,
    endTs,
    pointCount,
  });

  it('should merge clusters 200m apart with a 10 minute gap', () => {
    // 0.0018 degrees of latitude is ~200m
    const merged = mergeClusters([cluster(0, 0, 600), cluster(0.0018, 1200, 1800)]);

    expect(merged).toHaveLength(1);
    expect(merged[0].lat).toBeCloseTo(0.0009, 10);
    expect(merged[0]).toMatchObject({ startTs: 0, endTs: 1800, pointCount: 20 });
  });

  it('should not merge clusters 2km apart regardless of gap', () => {
    expect(mergeClusters([cluster(0, 0, 600), cluster(0.018, 1200, 1800)])).toHaveLength(2);
    expect(mergeClusters([cluster(0, 0, 600), cluster(0.018, 600, 1800)])).toHaveLength(2);
  });

  it('should not merge nearby clusters separated by more than 30 minutes', () => {
    expect(mergeClusters([cluster(0, 0, 600), cluster(0.0018, 600 + 1801, 3000)])).toHaveLength(2);
  });

  it('should weight the merged position by point count', () => {
    const merged = mergeClusters([cluster(0, 0, 600, 30), cluster(0.002, 700, 900, 10)]);
    expect(merged[0].lat).toBeCloseTo(0.0005, 10);
  });

  it('should leave the input clusters untouched', () => {
    const first = cluster(0, 0, 600);
    mergeClusters([first, cluster(0.0018, 1200, 1800)]);
    expect(first).toEqual(cluster(0, 0, 600));
  });
});

describe('travelDistance', () => {
  it('should sum legs between points inside the window', () => {
    const points = [point(0, 0), point(10, 0.005), point(20, 0.01), point(30, 0.05)];
    expect(travelDistance(points, 0, 20)).toBeCloseTo(1111.95, 1);
  });
});

describe('buildEntries', () => {
  it('should return nothing for no points', () => {
    expect(buildEntries([])).toEqual([]);
  });

  it('should produce stop, travel, stop', () => {
    const entries = buildEntries(dayOfPoints());

    expect(entries.map((e) => e.type)).toEqual(['stop', 'travel', 'stop']);
    expect(entries[0]).toEqual({
      type: 'stop',
      timestamp: 0,
      endTimestamp: 900,
      lat: 0,
      lon: 0,
      durationSeconds: 900,
    });
    expect(entries[1]).toMatchObject({
      type: 'travel',
      timestamp: 900,
      endTimestamp: 1140,
      lat: 0,
      lon: 0,
      endLat: 0,
      endLon: 0.02,
      durationSeconds: 240,
    });
    expect(entries[1].distanceMeters).toBeCloseTo(2223.9, 0);
    expect(entries[2]).toMatchObject({ type: 'stop', timestamp: 1140, endTimestamp: 2040, lon: 0.02 });
  });

  it('should ignore stays shorter than 10 minutes', () => {
    const brief = [point(0, 0), point(300, 0), point(360, 0.01)];
    expect(buildEntries(brief)).toEqual([]);
  });

  it('should attach photos taken within 5 minutes of a stop', () => {
    const photo = (timestamp: number, sourceId: string): PhotoLocation => ({ timestamp, lat: 0, lon: 0, sourceId });
    const entries = buildEntries(dayOfPoints(), [photo(-200, 'early'), photo(2300, 'late'), photo(5000, 'far')]);

    expect(entries[0].photos).toEqual([
      { sourceId: 'early', thumbnailUrl: '/api/immich/assets/early/thumbnail', filename: undefined },
    ]);
    expect(entries[1].photos).toBeUndefined();
    expect(entries[2].photos?.map((p) => p.sourceId)).toEqual(['late']);
  });
});

describe('TimelineBuilder', () => {
  // 2024-03-10T08:00:00Z
  const MORNING = 1710057600;
  let store: SqliteLocationStore;

  beforeEach(async () => {
    store = await SqliteLocationStore.open(':memory:');
    store.insertSamples(
      dayOfPoints(MORNING).map((p) => ({ ...p, userId: 'alice', deviceId: 'phone' }))
    );
  });

  afterEach(() => {
    store.close();
  });

  it('should return no entries for a day without samples', async () => {
    const builder = new TimelineBuilder(store);
    expect(await builder.build('alice', '2024-03-11')).toEqual({ date: '2024-03-11', entries: [] });
  });

  it('should name stops from the place resolver', async () => {
    const places: PlaceResolver = {
      reverseGeocodeBatch: vi.fn().mockResolvedValue(
        new Map([
          [0, { placeName: 'Home', lat: 0, lon: 0 }],
          [1, { placeName: 'Office', lat: 0, lon: 0.02 }],
        ])
      ),
    };

    const timeline = await new TimelineBuilder(store, places).build('alice', '2024-03-10');

    expect(places.reverseGeocodeBatch).toHaveBeenCalledWith([
      { lat: 0, lon: 0 },
      { lat: 0, lon: 0.02 },
    ]);
    expect(timeline.entries.map((e) => e.placeName)).toEqual(['Home', undefined, 'Office']);
  });

  it('should still return the timeline when the resolver fails', async () => {
    const places: PlaceResolver = {
      reverseGeocodeBatch: vi.fn().mockRejectedValue(new Error('upstream down')),
    };

    const timeline = await new TimelineBuilder(store, places).build('alice', '2024-03-10');

    expect(timeline.entries).toHaveLength(3);
    expect(timeline.entries.every((e) => e.placeName === undefined)).toBe(true);
  });

  it('should attach stored photos to the matching stop', async () => {
    store.insertSampleWithSource(
      { timestamp: MORNING + 300, userId: 'alice', deviceId: 'Pixel 8', lat: 0, lon: 0 },
      {
        timestamp: MORNING + 300,
        deviceId: 'Pixel 8',
        sourceType: 'immich',
        sourceId: 'asset-1',
        metadata: { webUrl: 'http://photos.local/photos/asset-1', filename: 'IMG_0001.jpg' },
      }
    );

    const timeline = await new TimelineBuilder(store).build('alice', '2024-03-10');

    expect(timeline.entries[0].photos).toEqual([
      { sourceId: 'asset-1', thumbnailUrl: '/api/immich/assets/asset-1/thumbnail', filename: 'IMG_0001.jpg' },
    ]);
    expect(timeline.entries[2].photos).toBeUndefined();
  });

  it('should build a day with a very large number of samples', async () => {
    const count = 250000;
    const samples = Array.from({ length: count }, (_, i) => ({
      timestamp: MORNING + i,
      userId: 'alice',
      deviceId: 'phone',
      lat: 0,
      lon: 0,
    }));
    vi.spyOn(store, 'querySamplesForUserDate').mockReturnValue(samples);
    const photos = vi.spyOn(store, 'queryPhotoLocations').mockReturnValue([]);

    const timeline = await new TimelineBuilder(store).build('alice', '2024-03-10');

    expect(photos).toHaveBeenCalledWith(MORNING, MORNING + count - 1);
    expect(timeline.entries).toHaveLength(1);
    expect(timeline.entries[0]).toMatchObject({
      type: 'stop',
      timestamp: MORNING,
      endTimestamp: MORNING + count - 1,
      durationSeconds: count - 1,
    });
  });
});
