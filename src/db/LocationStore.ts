import type {
  BBox,
  Bounds,
  GeocodedPlace,
  InsertResult,
  LocationSource,
  LocationSourceDetails,
  Path,
  PathPoint,
  PhotoLocation,
  Sample,
  TimeRange,
} from '../types/Location';
import type { ImportJob, ImportJobStatus } from '../types/ImportJob';

/**
 * Path metadata without its points
 */
export type PathRecord = Omit<Path, 'points' | 'id'> & { id: number };

/**
 * Persistence contract used by the pipeline and the import manager.
 * Every multi-step mutation is atomic: partial writes are never visible.
 */
export interface LocationStore {
  // Samples (idempotent on timestamp + deviceId)
  insertSample(sample: Sample): boolean;
  insertSamples(samples: Sample[]): InsertResult;
  insertSampleWithSource(sample: Sample, source: LocationSource): boolean;
  querySamplesForUserDate(userId: string, date: string): Sample[];
  queryAllSamples(): Sample[];
  latestSample(): Sample | undefined;
  boundsForRange(start: number, end: number): Bounds | undefined;
  queryPhotoLocations(start: number, end: number): PhotoLocation[];
  // Without a device id the first source recorded at that timestamp wins
  getLocationSource(timestamp: number, deviceId?: string): LocationSourceDetails | undefined;

  // Paths
  queryPathsIntersecting(bbox: BBox, range?: TimeRange): PathRecord[];
  getPathPoints(pathId: number): PathPoint[];
  upsertPath(path: Path): number;
  deleteAllPathsAndPoints(): void;
  replaceAllPaths(paths: Path[]): void;

  // Import jobs
  createJob(job: ImportJob): void;
  getJob(id: string): ImportJob | undefined;
  updateJob(job: ImportJob): void;
  listJobs(limit?: number): ImportJob[];
  listJobsByStatus(status: ImportJobStatus): ImportJob[];
  getLastSyncTimestamp(): number | undefined;
  setLastSyncTimestamp(timestamp: number): void;

  // Reverse geocoding cache
  lookupPlace(lat: number, lon: number): GeocodedPlace | undefined;
  cachePlace(bounds: Bounds, place: GeocodedPlace): void;

  close(): void;
}
