// Types
export type {
  RawTrackPoint,
  TimedTrackPoint,
  TrackPoint,
  RawSegment,
  CandidateSegment,
  NormalizedSegment,
  DropReason,
  SegmentDrop,
  SegmentNormalizeResult,
  PointNormalizeResult,
  FilterOptions,
  SegmentFilterResult,
  PreprocessOptions,
  Clock,
  SegmentStatus,
  SegmentOutcome,
  PreprocessReport,
  PreprocessResult,
} from './types';

// Errors
export { GpxFormatError, ConfigError } from './errors';

// Document model
export type { GpxDocument, ElementContent } from './gpx-document';
export {
  parseGpxDocument,
  childElements,
  childText,
  attributeText,
  createGpxDocument,
  appendElement,
  serializeGpx,
} from './gpx-document';

// Pipeline stages
export { extractSegments } from './segment-extractor';
export { normalizeSegments, compareTimestamps } from './segment-normalizer';
export { normalizePoints, DEFAULT_ELEVATION } from './point-normalizer';
export { filterSegment } from './segment-filter';
export {
  buildOutputDocument,
  formatCreationTime,
  systemClock,
  OUTPUT_NAMESPACE,
  OUTPUT_CREATOR,
  OUTPUT_VERSION,
} from './output-builder';

// Preprocessor
export type { PreprocessContext } from './gpx-preprocessor';
export { preprocessGpx, GPX_PREPROCESSOR_DEFAULTS } from './gpx-preprocessor';

// Segment report
export type { ReportDelimiter } from './segment-report';
export { formatSegmentReport } from './segment-report';

// Logging
export type { Logger, LoggerOptions, LogLevel, LogFormat } from './logger';
export { createLogger, logFormatFromEnv, LOGGER_DEFAULTS } from './logger';
