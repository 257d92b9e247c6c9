import type { TrackPoint, FilterOptions, SegmentFilterResult } from './types';

/**
 * Decide whether a normalized segment is written, and crop it when asked.
 *
 * Without cropping a segment needs more than `minPoints` points. With
 * cropping the first and last point go, so it needs more than
 * `minPoints + 2` before the crop. Segments of one or two points never
 * reach the crop.
 */
export function filterSegment(points: TrackPoint[], options: FilterOptions): SegmentFilterResult {
  const threshold = options.crop ? options.minPoints + 2 : options.minPoints;

  if (points.length <= threshold) {
    return { kept: false };
  }

  return {
    kept: true,
    points: options.crop ? points.slice(1, -1) : [...points],
  };
}
