import type { PathPoint, StationaryCluster } from '../types/Location';
import { distanceMeters } from './geometry';

export interface PruneResult {
  points: PathPoint[];
  removed: PathPoint[];
  clusters: StationaryCluster[];
}

function openCluster(point: PathPoint): StationaryCluster {
  return {
    lat: point.lat,
    lon: point.lon,
    startTs: point.timestamp,
    endTs: point.timestamp,
    pointCount: 1,
  };
}

function representative(cluster: StationaryCluster): PathPoint {
  return { lat: cluster.lat, lon: cluster.lon, timestamp: cluster.startTs };
}

/**
 * Collapse runs of points that stay within minDistMeters of a cluster anchor.
 *
 * The anchor is the first point of the cluster and does not move as the
 * cluster grows, so jitter around a stop cannot drag it away. Each cluster
 * is emitted as a single point at its anchor with the cluster start time.
 */
export function pruneStationaryPoints(points: PathPoint[], minDistMeters: number): PruneResult {
  if (points.length === 0) {
    return { points: [], removed: [], clusters: [] };
  }
  if (points.length === 1) {
    return { points, removed: [], clusters: [openCluster(points[0])] };
  }

  const kept: PathPoint[] = [];
  const removed: PathPoint[] = [];
  const clusters: StationaryCluster[] = [];

  let cluster = openCluster(points[0]);

  for (let i = 1; i < points.length; i++) {
    const point = points[i];

    if (distanceMeters(cluster, point) < minDistMeters) {
      cluster.endTs = point.timestamp;
      cluster.pointCount++;
      removed.push(point);
    } else {
      kept.push(representative(cluster));
      clusters.push(cluster);
      cluster = openCluster(point);
    }
  }

  kept.push(representative(cluster));
  clusters.push(cluster);

  return { points: kept, removed, clusters };
}
