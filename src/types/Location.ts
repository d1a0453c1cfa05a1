/**
 * Core types for location history
 * Timestamps are unix seconds throughout
 */

export interface Sample {
  timestamp: number;
  userId: string;
  deviceId: string;
  lat: number;
  lon: number;
  accuracyMeters?: number;
  altitudeMeters?: number;
  speedKmh?: number;
  source?: string; // owntracks, gpslogger, GPS, WIFI, immich...
}

export interface PathPoint {
  lat: number;
  lon: number;
  timestamp: number;
}

/**
 * Viewport bounding box (south-west / north-east corners)
 */
export interface BBox {
  swLat: number;
  swLon: number;
  neLat: number;
  neLon: number;
}

export interface Bounds {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export interface TimeRange {
  start?: number;
  end?: number;
}

/**
 * Pre-computed path for one user on one local calendar day
 */
export interface Path extends Bounds {
  id?: number;
  userId: string;
  date: string; // YYYY-MM-DD, local to each sample's longitude
  startTs: number;
  endTs: number;
  pointCount: number;
  points: PathPoint[];
}

export interface StationaryCluster {
  lat: number; // anchor: first point admitted, never moves
  lon: number;
  startTs: number;
  endTs: number;
  pointCount: number;
}

export interface LocationSourceMetadata {
  webUrl: string;
  filename: string;
  make?: string;
  model?: string;
}

/**
 * Provenance record linking a sample back to an external asset
 */
export interface LocationSource {
  timestamp: number;
  deviceId: string;
  sourceType: string;
  sourceId: string;
  metadata: LocationSourceMetadata;
}

/**
 * Provenance as read back for a single sample
 */
export interface LocationSourceDetails {
  sourceType: string;
  sourceId: string;
  webUrl?: string;
  filename?: string;
  make?: string;
  model?: string;
}

export interface PhotoLocation {
  timestamp: number;
  lat: number;
  lon: number;
  sourceId: string;
  webUrl?: string;
  filename?: string;
}

export interface InsertResult {
  inserted: number;
  skipped: number;
}

export interface GeocodedPlace {
  placeName: string;
  placeType?: string;
  displayName?: string;
  lat: number;
  lon: number;
}
