import * as fs from 'fs';
import * as path from 'path';
import type { Clock, Logger, PreprocessResult } from '../lib';
import {
  createLogger,
  logFormatFromEnv,
  GpxFormatError,
  preprocessGpx,
  formatSegmentReport,
  systemClock
} from '../lib';
import { parseCliArgs, UsageError, USAGE, VERSION } from './args';
import type { CliConfig, ParsedArgs } from './args';
import { checkInputFile, makeOutputPath, InputFileError } from './paths';

export const EXIT_OK = 0;
export const EXIT_INVALID_INPUT = 1;
export const EXIT_USAGE = 2;

export interface CliContext {
  clock: Clock;
  /** Overrides the logger built from the command-line flags */
  logger: Logger;
}

function writeFile(filename: string, content: string): void {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
  fs.writeFileSync(filename, content, 'utf-8');
}

function preprocessFile(config: CliConfig, clock: Clock, logger: Logger): number {
  try {
    checkInputFile(config.input);
  } catch (error) {
    if (error instanceof InputFileError) {
      logger.error(error, { input: config.input });
      return EXIT_USAGE;
    }
    throw error;
  }

  const xml = fs.readFileSync(config.input, 'utf-8');

  let result: PreprocessResult;
  try {
    result = preprocessGpx(xml, {
      minPoints: config.minPoints,
      crop: config.crop,
      quiet: config.quiet,
    }, { clock, logger });
  } catch (error) {
    if (error instanceof GpxFormatError) {
      logger.error(error, { input: config.input });
      return EXIT_INVALID_INPUT;
    }
    throw error;
  }

  const outputPath = makeOutputPath(config.input, config.destination, config.suffix);
  writeFile(outputPath, result.content);
  if (!config.quiet) {
    logger.info(`File written to ${outputPath}`, { ...result.report });
  }

  if (config.report) {
    writeFile(config.report, formatSegmentReport(result.segments));
    if (!config.quiet) {
      logger.info(`Report written to ${config.report}`);
    }
  }

  return EXIT_OK;
}

/**
 * Run the preprocessor for one command line and return the exit status
 */
export function runCli(args: string[], context: Partial<CliContext> = {}): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      const logger = context.logger ?? createLogger('preprocess-gpx', { format: logFormatFromEnv() });
      logger.error(error);
      console.error('');
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (parsed.kind === 'version') {
    console.log(VERSION);
    return EXIT_OK;
  }

  const { config } = parsed;
  const logger = context.logger ?? createLogger('preprocess-gpx', {
    format: config.jsonLogs ? 'json' : logFormatFromEnv(),
    quiet: config.quiet,
  });

  return preprocessFile(config, context.clock ?? systemClock, logger);
}
