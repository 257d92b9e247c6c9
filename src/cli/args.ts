import { GPX_PREPROCESSOR_DEFAULTS } from '../lib/gpx-preprocessor';

export const VERSION = '1.0.0';

export const DEFAULT_SUFFIX = '_pp';

export const USAGE = `Usage: tsx scripts/preprocess-gpx.ts [options] /path/to/file.gpx

Copies a GPX file, writing a new track around every track segment named
after its first trackpoint time. Empty and duplicate segments are dropped,
segments and trackpoints are sorted by time, and segments with too few
trackpoints are skipped.

Options:
  -d, --destination <dir>  Folder to save the processed file in
                           (default: the input file's folder)
  -m, --minpoints <n>      Skip segments with n trackpoints or less
                           (default: ${GPX_PREPROCESSOR_DEFAULTS.minPoints})
  -c, --crop               Drop the first and last trackpoint of every segment;
                           the minpoints threshold still applies afterwards
  -s, --suffix <text>      Suffix for the output file name (default: ${DEFAULT_SUFFIX})
  -r, --report <file>      Also write a CSV report of every segment
  -q, --quiet              Don't print progress information
      --json-logs          Print logs as JSON lines
  -h, --help               Show this help
  -V, --version            Show the version`;

export interface CliConfig {
  input: string;
  destination: string | null;
  minPoints: number;
  crop: boolean;
  suffix: string;
  report: string | null;
  quiet: boolean;
  jsonLogs: boolean;
}

export type ParsedArgs =
  | { kind: 'run'; config: CliConfig }
  | { kind: 'help' }
  | { kind: 'version' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ValueOption = 'destination' | 'minpoints' | 'suffix' | 'report';
type FlagOption = 'crop' | 'quiet' | 'json-logs' | 'help' | 'version';

const SHORT_OPTIONS: Record<string, ValueOption | FlagOption> = {
  d: 'destination',
  m: 'minpoints',
  s: 'suffix',
  r: 'report',
  c: 'crop',
  q: 'quiet',
  h: 'help',
  V: 'version',
};

const VALUE_OPTIONS: readonly string[] = ['destination', 'minpoints', 'suffix', 'report'];
const FLAG_OPTIONS: readonly string[] = ['crop', 'quiet', 'json-logs', 'help', 'version'];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.includes(name);
}

function isFlagOption(name: string): name is FlagOption {
  return FLAG_OPTIONS.includes(name);
}

function parseMinPoints(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`--minpoints must be a non-negative integer, got "${value}"`);
  }
  const minPoints = Number(value);
  if (!Number.isSafeInteger(minPoints)) {
    throw new UsageError(`--minpoints is too large: ${value}`);
  }
  return minPoints;
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[]): ParsedArgs {
  const values: Partial<Record<ValueOption, string>> = {};
  const flags = new Set<FlagOption>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }

    if (!arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }

    // --name, --name=value, -n
    let name: string;
    let inlineValue: string | undefined;
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);
    } else {
      const short = SHORT_OPTIONS[arg.slice(1)];
      if (!short) {
        throw new UsageError(`Unknown option: ${arg}`);
      }
      name = short;
    }

    if (isFlagOption(name)) {
      if (inlineValue !== undefined) {
        throw new UsageError(`Option --${name} does not take a value`);
      }
      flags.add(name);
    } else if (isValueOption(name)) {
      const value = inlineValue ?? args[++i];
      if (value === undefined) {
        throw new UsageError(`Option --${name} requires a value`);
      }
      values[name] = value;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (flags.has('help')) return { kind: 'help' };
  if (flags.has('version')) return { kind: 'version' };

  if (positional.length !== 1) {
    throw new UsageError('Please define one input GPX file');
  }

  return {
    kind: 'run',
    config: {
      input: positional[0],
      destination: values.destination ?? null,
      minPoints: values.minpoints === undefined
        ? GPX_PREPROCESSOR_DEFAULTS.minPoints
        : parseMinPoints(values.minpoints),
      crop: flags.has('crop'),
      suffix: values.suffix ?? DEFAULT_SUFFIX,
      report: values.report ?? null,
      quiet: flags.has('quiet'),
      jsonLogs: flags.has('json-logs'),
    },
  };
}
