import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PathIndexer, computePaths, pathKey } from '../PathIndexer';
import { SqliteLocationStore } from '../../db/SqliteLocationStore';
import type { Sample } from '../../types/Location';

// 2024-03-10T08:00:00Z
const MORNING = 1710057600;
const WORLD = { swLat: -90, swLon: -180, neLat: 90, neLon: 180 };

const sample = (timestamp: number, lat: number, lon: number, userId = 'alice', deviceId = 'phone'): Sample => ({
  timestamp,
  userId,
  deviceId,
  lat,
  lon,
});

describe('computePaths', () => {
  it('should bucket samples by user and local date', () => {
    const paths = computePaths([
      sample(MORNING, 1, 0),
      sample(MORNING + 86400, 1, 0),
      sample(MORNING, 1, 0, 'bob'),
    ]);

    expect([...paths.keys()].sort()).toEqual([
      pathKey('alice', '2024-03-10'),
      pathKey('alice', '2024-03-11'),
      pathKey('bob', '2024-03-10'),
    ].sort());
  });

  it('should sort points and accumulate bounds', () => {
    const paths = computePaths([
      sample(MORNING + 120, 3, -1),
      sample(MORNING, 1, 2),
      sample(MORNING + 60, 2, 1),
    ]);

    expect(paths.get(pathKey('alice', '2024-03-10'))).toEqual({
      userId: 'alice',
      date: '2024-03-10',
      startTs: MORNING,
      endTs: MORNING + 120,
      minLat: 1,
      maxLat: 3,
      minLon: -1,
      maxLon: 2,
      pointCount: 3,
      points: [
        { lat: 1, lon: 2, timestamp: MORNING },
        { lat: 2, lon: 1, timestamp: MORNING + 60 },
        { lat: 3, lon: -1, timestamp: MORNING + 120 },
      ],
    });
  });
});

describe('PathIndexer', () => {
  let store: SqliteLocationStore;
  let indexer: PathIndexer;

  beforeEach(async () => {
    store = await SqliteLocationStore.open(':memory:');
    indexer = new PathIndexer(store);
  });

  afterEach(() => {
    store.close();
  });

  it('should build a path from ingested samples', () => {
    const samples = [sample(MORNING, 1, 0.1), sample(MORNING + 60, 1.001, 0.1)];
    store.insertSamples(samples);

    expect(indexer.updateForSamples(samples)).toBe(1);

    const [path] = store.queryPathsIntersecting(WORLD);
    expect(path).toMatchObject({ userId: 'alice', date: '2024-03-10', pointCount: 2 });
    expect(store.getPathPoints(path.id)).toHaveLength(2);
  });

  it('should not duplicate points when the same sample arrives twice', () => {
    const first = sample(MORNING, 1, 0.1);
    store.insertSamples([first, sample(MORNING + 60, 1.001, 0.1)]);
    indexer.updateForSamples([first]);

    const again = store.insertSamples([first]);
    expect(again).toEqual({ inserted: 0, skipped: 1 });
    indexer.updateForSamples([first]);

    const paths = store.queryPathsIntersecting(WORLD);
    expect(paths).toHaveLength(1);
    expect(paths[0].pointCount).toBe(2);
    expect(store.getPathPoints(paths[0].id)).toHaveLength(2);
  });

  it('should fold late samples into the existing day in order', () => {
    store.insertSamples([sample(MORNING + 600, 1, 0.1)]);
    indexer.updateForSamples([sample(MORNING + 600, 1, 0.1)]);

    const late = sample(MORNING, 2, 0.2);
    store.insertSample(late);
    indexer.updateForSamples([late]);

    const [path] = store.queryPathsIntersecting(WORLD);
    expect(path).toMatchObject({ startTs: MORNING, endTs: MORNING + 600, minLat: 1, maxLat: 2 });
    expect(store.getPathPoints(path.id).map((p) => p.timestamp)).toEqual([MORNING, MORNING + 600]);
  });

  it('should return 0 for an empty batch', () => {
    expect(indexer.updateForSamples([])).toBe(0);
  });

  it('should rebuild every path from stored samples', () => {
    store.insertSamples([
      sample(MORNING, 1, 0.1),
      sample(MORNING + 86400, 1, 0.1),
      sample(MORNING, 5, 5, 'bob', 'tablet'),
    ]);

    expect(indexer.rebuildAll()).toBe(3);
    expect(store.queryPathsIntersecting(WORLD)).toHaveLength(3);

    // Running it again gives the same result
    expect(indexer.rebuildAll()).toBe(3);
    expect(store.queryPathsIntersecting(WORLD)).toHaveLength(3);
  });

  it('should leave existing paths in place when a rebuild fails part way', () => {
    const stored = [sample(MORNING, 1, 0.1), sample(MORNING + 86400, 1, 0.1), sample(MORNING, 5, 5, 'bob', 'tablet')];
    store.insertSamples(stored);
    indexer.rebuildAll();

    // The last day's bounds cannot be written, after three others were
    vi.spyOn(store, 'queryAllSamples').mockReturnValue([...stored, sample(MORNING, Number.NaN, 0, 'carol')]);

    expect(() => indexer.rebuildAll()).toThrow(/NOT NULL/);
    expect(store.queryPathsIntersecting(WORLD).map((p) => `${p.userId} ${p.date}`).sort()).toEqual([
      'alice 2024-03-10',
      'alice 2024-03-11',
      'bob 2024-03-10',
    ]);
  });
});
