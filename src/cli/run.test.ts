import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli, EXIT_OK, EXIT_INVALID_INPUT, EXIT_USAGE } from './run';
import { USAGE, VERSION } from './args';
import { preprocessGpx } from '../lib/gpx-preprocessor';
import type { Clock } from '../lib/types';
import type { Logger } from '../lib/logger';

const fixedClock: Clock = { now: () => new Date('2024-03-05T06:07:08Z') };

const SAMPLE_GPX = `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">
  <trk>
    <trkseg>
      <trkpt lat="52.1" lon="13.1"><ele>1</ele><time>2011-05-01T08:00:03Z</time></trkpt>
      <trkpt lat="52.2" lon="13.2"><ele>2</ele><time>2011-05-01T08:00:01Z</time></trkpt>
      <trkpt lat="52.3" lon="13.3"><time>2011-05-01T08:00:02Z</time></trkpt>
      <trkpt lat="52.4" lon="13.4"><ele>4</ele><time>2011-05-01T08:00:00Z</time></trkpt>
    </trkseg>
    <trkseg/>
  </trk>
</gpx>`;

// Helper to capture log messages
function createRecordingLogger(): Logger & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    debug: message => { messages.push(`debug: ${message}`); },
    info: message => { messages.push(message); },
    warn: message => { messages.push(`warn: ${message}`); },
    error: error => { messages.push(`error: ${error instanceof Error ? error.message : String(error)}`); },
  };
}

describe('runCli', () => {
  let dir: string;
  let input: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gpx-preprocess-run-'));
    input = join(dir, 'ride.gpx');
    writeFileSync(input, SAMPLE_GPX);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should write the cleaned file beside the input', () => {
    const logger = createRecordingLogger();

    const status = runCli(['-q', input], { clock: fixedClock, logger });

    expect(status).toBe(EXIT_OK);
    const expected = preprocessGpx(SAMPLE_GPX, { quiet: true }, { clock: fixedClock }).content;
    expect(readFileSync(join(dir, 'ride_pp.gpx'), 'utf-8')).toBe(expected);
    expect(logger.messages).toEqual([]);
  });

  it('should log progress and the output path when not quiet', () => {
    const logger = createRecordingLogger();
    const output = join(dir, 'ride_pp.gpx');

    runCli([input], { clock: fixedClock, logger });

    expect(logger.messages).toEqual([
      'Found 2 track segments',
      'Found 1 empty track segments',
      'Defaulted elevation on 1 trackpoints',
      'Skipped 0 track segments with 3 trackpoints or less',
      `File written to ${output}`,
    ]);
  });

  it('should honour destination, suffix, crop and minpoints', () => {
    const destination = join(dir, 'clean');

    const status = runCli(['-d', destination, '-s', '.clean', '-c', '-m', '1', '-q', input], {
      clock: fixedClock,
      logger: createRecordingLogger(),
    });

    expect(status).toBe(EXIT_OK);
    const content = readFileSync(join(destination, 'ride.clean.gpx'), 'utf-8');
    expect(content).toContain('<name>2011-05-01T08:00:01Z</name>');
    expect(content).toContain('<trkpt lat="52.2" lon="13.2">');
    expect(content).toContain('<trkpt lat="52.3" lon="13.3">');
    expect(content).not.toContain('lat="52.4"');
    expect(content).not.toContain('lat="52.1"');
  });

  it('should write the segment report when asked', () => {
    const report = join(dir, 'reports', 'ride.csv');

    runCli(['-q', '--report', report, input], { clock: fixedClock, logger: createRecordingLogger() });

    expect(readFileSync(report, 'utf-8').split('\r\n')).toEqual([
      '"Index","First Time","Name","Source Points","Written Points","Status"',
      '"0","2011-05-01T08:00:03Z","2011-05-01T08:00:00Z","4","4","written"',
      '"1","","","0","0","empty"',
    ]);
  });

  it('should fail with status 2 for a missing input file', () => {
    const logger = createRecordingLogger();
    const missing = join(dir, 'missing.gpx');

    const status = runCli([missing], { logger });

    expect(status).toBe(EXIT_USAGE);
    expect(logger.messages).toEqual([`error: input file ${missing} not found`]);
  });

  it('should fail with status 1 and write nothing for malformed GPX', () => {
    const broken = join(dir, 'broken.gpx');
    writeFileSync(broken, '<gpx xmlns="http://www.topografix.com/GPX/1/1"><trk>');
    const logger = createRecordingLogger();

    const status = runCli(['-q', broken], { logger });

    expect(status).toBe(EXIT_INVALID_INPUT);
    expect(existsSync(join(dir, 'broken_pp.gpx'))).toBe(false);
    expect(logger.messages).toHaveLength(1);
    expect(logger.messages[0]).toMatch(/^error: Invalid GPX XML/);
  });

  it('should print usage with status 2 for bad arguments', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createRecordingLogger();

    const status = runCli(['--minpoints', 'x', input], { logger });

    expect(status).toBe(EXIT_USAGE);
    expect(logger.messages).toEqual(['error: --minpoints must be a non-negative integer, got "x"']);
    expect(errorSpy).toHaveBeenLastCalledWith(USAGE);
  });

  it('should print help and version', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(runCli(['--help'])).toBe(EXIT_OK);
    expect(runCli(['--version'])).toBe(EXIT_OK);

    expect(logSpy).toHaveBeenNthCalledWith(1, USAGE);
    expect(logSpy).toHaveBeenNthCalledWith(2, VERSION);
  });
});
