// GPX Types
// Values are kept as the strings found in the source document.
export interface RawTrackPoint {
  lat: string;
  lon: string;
  ele: string | null;
  time: string | null;
}

export interface TrackPoint {
  lat: string;
  lon: string;
  ele: string;
  time: string;
}

/** A point whose timestamp is known but whose elevation may still be missing */
export type TimedTrackPoint = RawTrackPoint & { time: string };

export interface RawSegment {
  index: number;      // position among all segments in the source
  points: RawTrackPoint[];
}

export interface CandidateSegment {
  index: number;
  firstTime: string;  // first point in source order, fixed before any sort or crop
  points: TimedTrackPoint[];
}

export interface NormalizedSegment {
  index: number;
  firstTime: string;
  points: TrackPoint[];
}

// Segment Normalizer Types
export type DropReason = 'empty' | 'untimed' | 'duplicate';

export interface SegmentDrop {
  index: number;
  firstTime: string | null;
  pointCount: number;
  reason: DropReason;
}

export interface SegmentNormalizeResult {
  segments: CandidateSegment[];
  dropped: SegmentDrop[];
  counts: {
    empty: number;
    untimed: number;
    duplicates: number;
  };
}

// Point Normalizer Types
export interface PointNormalizeResult {
  points: TrackPoint[];
  defaultedElevations: number;
}

// Segment Filter Types
export interface FilterOptions {
  minPoints: number;
  crop: boolean;      // drop the first and last point of every segment
}

export type SegmentFilterResult =
  | { kept: true; points: TrackPoint[] }
  | { kept: false };

// Preprocessor Types
export interface PreprocessOptions extends FilterOptions {
  quiet: boolean;     // silences the progress messages only
}

export interface Clock {
  now(): Date;
}

export type SegmentStatus = 'written' | DropReason | 'skipped';

export interface SegmentOutcome {
  index: number;
  firstTime: string | null;
  name: string | null;          // output track name, set when written
  sourcePoints: number;
  writtenPoints: number;
  status: SegmentStatus;
}

export interface PreprocessReport {
  found: number;
  empty: number;
  untimed: number;
  duplicates: number;
  skipped: number;
  defaultedElevations: number;
  written: number;
}

export interface PreprocessResult {
  content: string;              // serialized GPX XML
  document: Document;
  report: PreprocessReport;
  segments: SegmentOutcome[];   // source order
}
