/**
 * Logging for the preprocessing pipeline and its command line.
 *
 * `text` output is meant for a terminal: the bare message for info and
 * debug, prefixed messages on stderr for warnings and errors.
 * `json` output writes one JSON object per line so runs can be collected
 * by a log aggregator.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  format: LogFormat;
  quiet: boolean;     // drops debug and info
  verbose: boolean;   // enables debug
}

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(error: unknown, extra?: Record<string, unknown>): void;
}

interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  format: 'text',
  quiet: false,
  verbose: false,
};

function formatLog(level: LogLevel, context: string, message: string, extra?: Record<string, unknown>): string {
  const entry: LogEntry = {
    level,
    context,
    message,
    timestamp: new Date().toISOString(),
    ...extra,
  };
  return JSON.stringify(entry);
}

function formatText(level: LogLevel, message: string): string {
  switch (level) {
    case 'warn':
      return `Warning: ${message}`;
    case 'error':
      return `Error: ${message}`;
    default:
      return message;
  }
}

/**
 * Create a logger bound to a context name
 */
export function createLogger(context: string, options: Partial<LoggerOptions> = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const write = (level: LogLevel, message: string, extra?: Record<string, unknown>): void => {
    const line = opts.format === 'json'
      ? formatLog(level, context, message, extra)
      : formatText(level, message);

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug(message, extra) {
      if (opts.verbose && !opts.quiet) {
        write('debug', message, extra);
      }
    },
    info(message, extra) {
      if (!opts.quiet) {
        write('info', message, extra);
      }
    },
    warn(message, extra) {
      write('warn', message, extra);
    },
    error(error, extra) {
      const message = error instanceof Error ? error.message : String(error);
      write('error', message, extra);
    },
  };
}

/**
 * Pick the log format from the environment (`GPX_PREPROCESS_LOG_FORMAT`)
 */
export function logFormatFromEnv(env: NodeJS.ProcessEnv = process.env): LogFormat {
  return env.GPX_PREPROCESS_LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'text';
}

export { DEFAULT_OPTIONS as LOGGER_DEFAULTS };
