/**
 * Minimal leveled logger used by the server. Pass your own implementation
 * through the server config to route output elsewhere.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/** Options for the console logger. */
export interface ConsoleLoggerOptions {
  /** Prefix for every line. Default: "[wirelet]". */
  prefix?: string;
  /** Emit debug lines. Default: false. */
  verbose?: boolean;
  /** Where lines go. Defaults to `console.log` for info, `console.error` otherwise. */
  sink?: {
    out: (line: string) => void;
    err: (line: string) => void;
  };
}

/** One-line description of an error, prefixed with its `code` when it has one. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return "code" in error && typeof error.code === "string"
      ? `${error.code}: ${error.message}`
      : error.message;
  }
  return String(error);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const {
    prefix = "[wirelet]",
    verbose = false,
    sink = {
      out: (line: string) => console.log(line),
      err: (line: string) => console.error(line),
    },
  } = options;

  return {
    debug(message) {
      if (verbose) sink.err(`${prefix} debug: ${message}`);
    },
    info(message) {
      sink.out(`${prefix} ${message}`);
    },
    warn(message) {
      sink.err(`${prefix} warn: ${message}`);
    },
    error(message, error) {
      sink.err(error === undefined ? `${prefix} error: ${message}` : `${prefix} error: ${message} (${describeError(error)})`);
    },
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
