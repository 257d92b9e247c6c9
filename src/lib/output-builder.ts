import type { Clock, NormalizedSegment } from './types';
import { appendElement, createGpxDocument } from './gpx-document';

export const OUTPUT_NAMESPACE = 'http://www.topografix.com/GPX/1/0';
export const OUTPUT_CREATOR = 'gpx-preprocess';
export const OUTPUT_VERSION = '1.0';

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Format an instant as YYYY-MM-DDTHH:MM:SSZ (UTC, whole seconds)
 */
export function formatCreationTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Build the output GPX document.
 *
 * Each segment becomes its own <trk>, named after the time of its first
 * point, in the order given. Segments arrive filtered, sorted and cropped.
 */
export function buildOutputDocument(segments: NormalizedSegment[], clock: Clock = systemClock): Document {
  const document = createGpxDocument(OUTPUT_NAMESPACE, [
    ['creator', OUTPUT_CREATOR],
    ['version', OUTPUT_VERSION],
  ]);
  const root = document.documentElement;

  appendElement(root, 'time', { text: formatCreationTime(clock.now()) });

  for (const segment of segments) {
    const [first] = segment.points;
    if (!first) {
      throw new Error(`Segment ${segment.index} has no points to write`);
    }

    const trk = appendElement(root, 'trk');
    appendElement(trk, 'name', { text: first.time });
    const trkseg = appendElement(trk, 'trkseg');

    for (const pt of segment.points) {
      const trkpt = appendElement(trkseg, 'trkpt', {
        attributes: [['lat', pt.lat], ['lon', pt.lon]],
      });
      appendElement(trkpt, 'ele', { text: pt.ele });
      appendElement(trkpt, 'time', { text: pt.time });
    }
  }

  return document;
}
