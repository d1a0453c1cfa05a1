import type { PathPoint } from '../types/Location';
import { distanceMeters } from './geometry';

export interface SpikeResult {
  points: PathPoint[];
  removed: PathPoint[];
}

/**
 * Drop single bad fixes: B is a spike when it is far from both the last kept
 * point A and the next point C while A and C are close together.
 *
 * Comparing against the last kept point (not the previous raw point) lets a
 * run of consecutive spikes each be judged against the same anchor.
 * First and last points are always kept.
 */
export function removeSpikes(points: PathPoint[], thresholdMeters: number): SpikeResult {
  if (points.length < 3) {
    return { points, removed: [] };
  }

  const kept: PathPoint[] = [points[0]];
  const removed: PathPoint[] = [];

  for (let i = 1; i < points.length - 1; i++) {
    const a = kept[kept.length - 1];
    const b = points[i];
    const c = points[i + 1];

    const isSpike =
      distanceMeters(a, b) > thresholdMeters &&
      distanceMeters(b, c) > thresholdMeters &&
      distanceMeters(a, c) <= thresholdMeters;

    if (isSpike) {
      removed.push(b);
    } else {
      kept.push(b);
    }
  }

  kept.push(points[points.length - 1]);

  return { points: kept, removed };
}
