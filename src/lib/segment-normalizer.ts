import type {
  RawSegment,
  RawTrackPoint,
  TimedTrackPoint,
  CandidateSegment,
  SegmentDrop,
  SegmentNormalizeResult
} from './types';

function isTimed(point: RawTrackPoint): point is TimedTrackPoint {
  return point.time !== null;
}

/**
 * Compare ISO-8601 timestamps. Code unit order is chronological order for
 * timestamps written in the same format, so no date parsing happens.
 */
export function compareTimestamps(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Prepare the raw segment list for output:
 * - drop segments without points
 * - drop segments with an untimed point (they can be neither sorted nor keyed)
 * - drop later segments whose first timestamp was already seen
 * - sort what is left by first timestamp
 *
 * The first timestamp is taken from the first point in source order.
 * A new list is built at every step; the input is left as it is.
 */
export function normalizeSegments(segments: RawSegment[]): SegmentNormalizeResult {
  const candidates: CandidateSegment[] = [];
  const dropped: SegmentDrop[] = [];
  const seenFirstTimes = new Set<string>();
  const counts = { empty: 0, untimed: 0, duplicates: 0 };

  for (const segment of segments) {
    const pointCount = segment.points.length;

    if (pointCount === 0) {
      counts.empty++;
      dropped.push({ index: segment.index, firstTime: null, pointCount, reason: 'empty' });
      continue;
    }

    const points = segment.points.filter(isTimed);
    const firstTime = segment.points[0].time;

    if (firstTime === null || points.length !== pointCount) {
      counts.untimed++;
      dropped.push({ index: segment.index, firstTime, pointCount, reason: 'untimed' });
      continue;
    }

    if (seenFirstTimes.has(firstTime)) {
      counts.duplicates++;
      dropped.push({ index: segment.index, firstTime, pointCount, reason: 'duplicate' });
      continue;
    }

    seenFirstTimes.add(firstTime);
    candidates.push({ index: segment.index, firstTime, points });
  }

  // Array.prototype.sort is stable, so equal keys keep source order
  const sorted = [...candidates].sort((a, b) => compareTimestamps(a.firstTime, b.firstTime));

  return { segments: sorted, dropped, counts };
}
