/**
 * Output Utilities
 *
 * Terminal colors and the run logger.
 * Supports CI mode (no colors) via --ci flag or CI=true environment variable.
 *
 * Progress and results go to stdout; warnings, errors and the verbose/debug
 * channels go to the diagnostic stream (stderr) so they never mix with
 * output a caller might capture.
 */

export interface Colors {
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
  dim: string;
  bold: string;
  reset: string;
}

/** Where logger lines end up. Defaults to the process streams. */
export interface LogSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface LoggerOptions {
  verboseLevel?: number;
  debugLevel?: number;
  ciMode?: boolean;
  sink?: LogSink;
}

export interface Logger {
  colors: Colors;
  ciMode: boolean;
  verboseLevel: number;
  debugLevel: number;
  log: (msg: string) => void;
  info: (msg: string) => void;
  success: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  /** Printed only when the verbose level is at least `level` */
  verbose: (msg: string, level?: number) => void;
  /** Printed only when the debug level is at least `level` */
  debug: (msg: string, level?: number) => void;
}

/**
 * Detect if running in CI mode
 */
export function isCI(): boolean {
  return process.argv.includes('--ci') || process.env.CI === 'true';
}

/**
 * Get color codes (empty strings in CI mode)
 */
export function getColors(ciMode: boolean = isCI()): Colors {
  if (ciMode) {
    return {
      red: '',
      green: '',
      yellow: '',
      blue: '',
      cyan: '',
      magenta: '',
      dim: '',
      bold: '',
      reset: '',
    };
  }

  return {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    magenta: '\x1b[35m',
    dim: '\x1b[2m',
    bold: '\x1b[1m',
    reset: '\x1b[0m',
  };
}

const processSink: LogSink = {
  out: (line: string) => console.log(line),
  err: (line: string) => console.error(line),
};

/**
 * Create a logger with color support and leveled verbose/debug channels
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    verboseLevel = 0,
    debugLevel = 0,
    ciMode = isCI(),
    sink = processSink,
  } = options;
  const c = getColors(ciMode);

  return {
    colors: c,
    ciMode,
    verboseLevel,
    debugLevel,

    log: (msg: string) => sink.out(msg),
    info: (msg: string) => sink.out(`${c.blue}${msg}${c.reset}`),
    success: (msg: string) => sink.out(`${c.green}${msg}${c.reset}`),

    warn: (msg: string) => sink.err(`${c.yellow}⚠ ${msg}${c.reset}`),
    error: (msg: string) => sink.err(`${c.red}✗ ${msg}${c.reset}`),

    verbose: (msg: string, level: number = 1) => {
      if (verboseLevel >= level) sink.err(`${c.dim}${msg}${c.reset}`);
    },
    debug: (msg: string, level: number = 1) => {
      if (debugLevel >= level) sink.err(`${c.magenta}[debug] ${msg}${c.reset}`);
    },
  };
}

/**
 * Logger that records every line instead of printing. Used by tests and by
 * callers that want to inspect diagnostics after a run.
 */
export function createMemoryLogger(options: Omit<LoggerOptions, 'sink' | 'ciMode'> = {}): {
  logger: Logger;
  out: string[];
  err: string[];
} {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({
    ...options,
    ciMode: true,
    sink: { out: line => out.push(line), err: line => err.push(line) },
  });
  return { logger, out, err };
}

/**
 * Format a count with proper pluralization
 */
export function formatCount(count: number, singular: string, plural: string | null = null): string {
  const form = count === 1 ? singular : (plural || singular + 's');
  return `${count} ${form}`;
}
