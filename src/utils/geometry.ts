import type { BBox, PathPoint } from '../types/Location';

/**
 * Geometry helpers for path rendering.
 * Inputs are plain degrees and are not range-checked; NaN propagates.
 */

const EARTH_RADIUS_METERS = 6371000;

const MIN_TOLERANCE_DEG = 0.00001; // ~1m
const MAX_TOLERANCE_DEG = 0.001; // ~100m

type LatLon = Pick<PathPoint, 'lat' | 'lon'>;

const toRadians = (deg: number) => (deg * Math.PI) / 180;

/**
 * Great-circle (haversine) distance in meters
 */
export function distanceMeters(p1: LatLon, p2: LatLon): number {
  const lat1 = toRadians(p1.lat);
  const lat2 = toRadians(p2.lat);
  const dLat = toRadians(p2.lat - p1.lat);
  const dLon = toRadians(p2.lon - p1.lon);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
}

/**
 * Distance from a point to the line through lineStart/lineEnd, in raw degree space.
 * Falls back to point-to-point distance when the line has zero length.
 */
export function perpendicularDistance(point: LatLon, lineStart: LatLon, lineEnd: LatLon): number {
  const dx = lineEnd.lon - lineStart.lon;
  const dy = lineEnd.lat - lineStart.lat;

  if (dx === 0 && dy === 0) {
    const dLon = point.lon - lineStart.lon;
    const dLat = point.lat - lineStart.lat;
    return Math.sqrt(dLon * dLon + dLat * dLat);
  }

  const numerator = Math.abs(
    dy * point.lon - dx * point.lat + lineEnd.lon * lineStart.lat - lineEnd.lat * lineStart.lon
  );
  return numerator / Math.sqrt(dx * dx + dy * dy);
}

/**
 * Douglas-Peucker simplification with tolerance in degrees.
 * Output is a subsequence that always keeps the first and last points.
 */
export function simplify<T extends LatLon>(points: T[], toleranceDegrees: number): T[] {
  if (points.length <= 2) return points;

  const first = points[0];
  const last = points[points.length - 1];

  let maxDistance = 0;
  let maxIndex = 0;
  for (let i = 1; i < points.length - 1; i++) {
    const distance = perpendicularDistance(points[i], first, last);
    if (distance > maxDistance) {
      maxDistance = distance;
      maxIndex = i;
    }
  }

  if (maxDistance > toleranceDegrees) {
    const left = simplify(points.slice(0, maxIndex + 1), toleranceDegrees);
    const right = simplify(points.slice(maxIndex), toleranceDegrees);
    return [...left.slice(0, -1), ...right];
  }

  return [first, last];
}

/**
 * Simplification tolerance for a viewport: 0.1% of its smaller side,
 * clamped so deep zoom keeps ~1m detail and wide views drop below ~100m
 */
export function toleranceForViewport(bbox: BBox): number {
  const latSpan = bbox.neLat - bbox.swLat;
  const lonSpan = bbox.neLon - bbox.swLon;
  const tolerance = Math.min(latSpan, lonSpan) * 0.001;

  return Math.min(MAX_TOLERANCE_DEG, Math.max(MIN_TOLERANCE_DEG, tolerance));
}
