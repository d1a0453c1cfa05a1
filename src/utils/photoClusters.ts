import type { BBox, PhotoLocation } from '../types/Location';

/**
 * Viewport-sized grouping of geotagged photos for map markers
 */

const RADIUS_FRACTION = 0.02;
export const MIN_CLUSTER_RADIUS_DEGREES = 0.0005; // ~50m
export const MAX_CLUSTER_RADIUS_DEGREES = 0.1; // ~10km

export const thumbnailUrl = (sourceId: string) => `/api/immich/assets/${sourceId}/thumbnail`;

export interface ClusteredPhoto {
  sourceId: string;
  timestamp: number;
  thumbnailUrl: string;
  filename?: string;
  webUrl?: string;
}

export interface PhotoCluster {
  lat: number;
  lon: number;
  count: number;
  thumbnailUrl: string;
  photos: ClusteredPhoto[];
}

/**
 * 2% of the viewport's shorter side, clamped
 */
export function clusterRadius(bbox: BBox): number {
  const span = Math.min(bbox.neLat - bbox.swLat, bbox.neLon - bbox.swLon);
  return Math.min(MAX_CLUSTER_RADIUS_DEGREES, Math.max(MIN_CLUSTER_RADIUS_DEGREES, span * RADIUS_FRACTION));
}

/**
 * Greedy clustering in degree space. A photo joins the first cluster whose
 * running centroid is within radius; the marker sits on the cluster's last
 * (most recent) photo.
 */
export function clusterPhotos(photos: PhotoLocation[], radius: number): PhotoCluster[] {
  const groups: { lat: number; lon: number; photos: PhotoLocation[] }[] = [];

  for (const photo of photos) {
    const group = groups.find((g) => Math.hypot(photo.lat - g.lat, photo.lon - g.lon) < radius);
    if (group) {
      const n = group.photos.length;
      group.lat = (group.lat * n + photo.lat) / (n + 1);
      group.lon = (group.lon * n + photo.lon) / (n + 1);
      group.photos.push(photo);
    } else {
      groups.push({ lat: photo.lat, lon: photo.lon, photos: [photo] });
    }
  }

  return groups.map((group) => {
    const key = group.photos[group.photos.length - 1];
    return {
      lat: key.lat,
      lon: key.lon,
      count: group.photos.length,
      thumbnailUrl: thumbnailUrl(key.sourceId),
      photos: group.photos.map((photo) => {
        const item: ClusteredPhoto = {
          sourceId: photo.sourceId,
          timestamp: photo.timestamp,
          thumbnailUrl: thumbnailUrl(photo.sourceId),
        };
        if (photo.filename) item.filename = photo.filename;
        if (photo.webUrl) item.webUrl = photo.webUrl;
        return item;
      }),
    };
  });
}
