import type { TimedTrackPoint, TrackPoint, PointNormalizeResult } from './types';
import { compareTimestamps } from './segment-normalizer';

export const DEFAULT_ELEVATION = '0';

/**
 * Sort a segment's points by time and fill in missing elevations.
 *
 * Points sharing a timestamp are all kept, in their source order.
 */
export function normalizePoints(points: TimedTrackPoint[]): PointNormalizeResult {
  let defaultedElevations = 0;

  const sorted = [...points].sort((a, b) => compareTimestamps(a.time, b.time));

  const normalized: TrackPoint[] = sorted.map(pt => {
    if (pt.ele === null) {
      defaultedElevations++;
    }
    return {
      lat: pt.lat,
      lon: pt.lon,
      ele: pt.ele ?? DEFAULT_ELEVATION,
      time: pt.time,
    };
  });

  return { points: normalized, defaultedElevations };
}
