import type { LocationStore } from '../db/LocationStore';
import type { BBox, Path, PathPoint, TimeRange } from '../types/Location';
import { simplify, toleranceForViewport } from '../utils/geometry';
import { pruneStationaryPoints } from '../utils/stationaryPruner';
import { removeSpikes } from '../utils/spikeFilter';

export type SimplifyStage = 'stationary' | 'spikes';

export const DEFAULT_STAGE_ORDER: readonly SimplifyStage[] = ['stationary', 'spikes'];

export interface SimplifyOptions extends TimeRange {
  pruneMeters?: number; // 0 or unset disables stationary pruning
  spikeMeters?: number; // 0 or unset disables spike removal
  order?: readonly string[];
}

export interface RemovedPoints {
  stationary: PathPoint[];
  spikes: PathPoint[];
}

export interface PathsResult {
  paths: Path[];
  removed: RemovedPoints;
}

/**
 * Viewport read path: load intersecting paths, run the optional filter
 * stages in the requested order, then Douglas-Peucker at a tolerance
 * derived from the viewport size.
 *
 * Stage order matters: spike detection sees different neighbours once
 * stationary points have been merged.
 */
export class PathSimplifier {
  constructor(private readonly store: LocationStore) {}

  queryPaths(bbox: BBox, options: SimplifyOptions = {}): PathsResult {
    const { start, end, pruneMeters = 0, spikeMeters = 0, order = DEFAULT_STAGE_ORDER } = options;

    const tolerance = toleranceForViewport(bbox);
    const removed: RemovedPoints = { stationary: [], spikes: [] };

    const paths = this.store.queryPathsIntersecting(bbox, { start, end }).map((record): Path => {
      let points = this.store.getPathPoints(record.id);

      for (const stage of order) {
        if (stage === 'stationary' && pruneMeters > 0) {
          const result = pruneStationaryPoints(points, pruneMeters);
          points = result.points;
          removed.stationary = removed.stationary.concat(result.removed);
        } else if (stage === 'spikes' && spikeMeters > 0) {
          const result = removeSpikes(points, spikeMeters);
          points = result.points;
          removed.spikes = removed.spikes.concat(result.removed);
        }
      }

      return { ...record, points: simplify(points, tolerance) };
    });

    return { paths, removed };
  }
}
