import type {
  Clock,
  NormalizedSegment,
  PreprocessOptions,
  PreprocessReport,
  PreprocessResult,
  SegmentOutcome
} from './types';
import type { Logger } from './logger';
import { createLogger } from './logger';
import { ConfigError } from './errors';
import { parseGpxDocument, serializeGpx } from './gpx-document';
import { extractSegments } from './segment-extractor';
import { normalizeSegments } from './segment-normalizer';
import { normalizePoints } from './point-normalizer';
import { filterSegment } from './segment-filter';
import { buildOutputDocument, systemClock } from './output-builder';

const DEFAULT_OPTIONS: PreprocessOptions = {
  minPoints: 3,
  crop: false,
  quiet: false,
};

export interface PreprocessContext {
  clock: Clock;
  logger: Logger;
}

function validateOptions(opts: PreprocessOptions): void {
  if (!Number.isSafeInteger(opts.minPoints) || opts.minPoints < 0) {
    throw new ConfigError(`minPoints must be a non-negative integer, got ${opts.minPoints}`, 'minPoints');
  }
}

/**
 * Clean a GPX file for ingestion.
 *
 * Every track segment of the input is written as a track of its own,
 * named after its first point's time. Empty, untimed and duplicate
 * segments are dropped, segments are ordered by time, points inside a
 * segment are ordered by time, missing elevations become "0", and
 * segments with `minPoints` points or fewer are skipped (after removing
 * the first and last point when `crop` is set).
 */
export function preprocessGpx(
  xml: string,
  options: Partial<PreprocessOptions> = {},
  context: Partial<PreprocessContext> = {}
): PreprocessResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  validateOptions(opts);

  const clock = context.clock ?? systemClock;
  const logger = context.logger ?? createLogger('preprocess', { quiet: opts.quiet });
  const progress = (message: string): void => {
    if (!opts.quiet) logger.info(message);
  };

  const gpx = parseGpxDocument(xml);
  const rawSegments = extractSegments(gpx);
  progress(`Found ${rawSegments.length} track segments`);

  const { segments: candidates, dropped, counts } = normalizeSegments(rawSegments);
  if (counts.empty > 0) progress(`Found ${counts.empty} empty track segments`);
  if (counts.untimed > 0) progress(`Found ${counts.untimed} track segments with untimed points`);
  if (counts.duplicates > 0) progress(`Found ${counts.duplicates} duplicate track segments`);

  const outcomes: SegmentOutcome[] = dropped.map(drop => ({
    index: drop.index,
    firstTime: drop.firstTime,
    name: null,
    sourcePoints: drop.pointCount,
    writtenPoints: 0,
    status: drop.reason,
  }));

  const written: NormalizedSegment[] = [];
  let defaultedElevations = 0;
  let skipped = 0;

  for (const candidate of candidates) {
    const normalized = normalizePoints(candidate.points);
    defaultedElevations += normalized.defaultedElevations;

    const filtered = filterSegment(normalized.points, opts);
    if (!filtered.kept) {
      skipped++;
      outcomes.push({
        index: candidate.index,
        firstTime: candidate.firstTime,
        name: null,
        sourcePoints: candidate.points.length,
        writtenPoints: 0,
        status: 'skipped',
      });
      continue;
    }

    written.push({ index: candidate.index, firstTime: candidate.firstTime, points: filtered.points });
    outcomes.push({
      index: candidate.index,
      firstTime: candidate.firstTime,
      name: filtered.points[0].time,
      sourcePoints: candidate.points.length,
      writtenPoints: filtered.points.length,
      status: 'written',
    });
  }

  if (defaultedElevations > 0) progress(`Defaulted elevation on ${defaultedElevations} trackpoints`);
  progress(`Skipped ${skipped} track segments with ${opts.minPoints} trackpoints or less`);

  const document = buildOutputDocument(written, clock);

  const report: PreprocessReport = {
    found: rawSegments.length,
    empty: counts.empty,
    untimed: counts.untimed,
    duplicates: counts.duplicates,
    skipped,
    defaultedElevations,
    written: written.length,
  };

  return {
    content: serializeGpx(document),
    document,
    report,
    segments: outcomes.sort((a, b) => a.index - b.index),
  };
}

export { DEFAULT_OPTIONS as GPX_PREPROCESSOR_DEFAULTS };
