import type { RawSegment, RawTrackPoint } from './types';
import type { GpxDocument } from './gpx-document';
import { attributeText, childElements, childText } from './gpx-document';
import { GpxFormatError } from './errors';

function extractPoint(trkpt: Element, namespace: string, segmentIndex: number): RawTrackPoint {
  const lat = attributeText(trkpt, 'lat');
  const lon = attributeText(trkpt, 'lon');

  if (lat === null || lon === null) {
    throw new GpxFormatError(`Invalid GPX XML: trackpoint in segment ${segmentIndex} is missing lat/lon`);
  }

  return {
    lat,
    lon,
    ele: childText(trkpt, namespace, 'ele'),
    time: childText(trkpt, namespace, 'time'),
  };
}

/**
 * Collect every <trkseg> under every <trk> of the document, in document order.
 *
 * Tracks are not kept: each segment later becomes a track of its own.
 */
export function extractSegments(gpx: GpxDocument): RawSegment[] {
  const { root, namespace } = gpx;
  const segments: RawSegment[] = [];

  for (const trk of childElements(root, namespace, 'trk')) {
    for (const trkseg of childElements(trk, namespace, 'trkseg')) {
      const index = segments.length;
      segments.push({
        index,
        points: childElements(trkseg, namespace, 'trkpt').map(pt => extractPoint(pt, namespace, index)),
      });
    }
  }

  return segments;
}
