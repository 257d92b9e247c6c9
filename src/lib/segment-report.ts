import Papa from 'papaparse';
import type { SegmentOutcome } from './types';

export type ReportDelimiter = ',' | ';' | '\t';

const REPORT_HEADERS = ['Index', 'First Time', 'Name', 'Source Points', 'Written Points', 'Status'];

/**
 * Write one CSV row per input segment describing what happened to it,
 * for auditing a file before it goes into the reference database
 */
export function formatSegmentReport(outcomes: SegmentOutcome[], delimiter: ReportDelimiter = ','): string {
  const data = outcomes.map(outcome => [
    outcome.index,
    outcome.firstTime ?? '',
    outcome.name ?? '',
    outcome.sourcePoints,
    outcome.writtenPoints,
    outcome.status,
  ]);

  return Papa.unparse({
    fields: REPORT_HEADERS,
    data,
  }, { quotes: true, delimiter });
}
