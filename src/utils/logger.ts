/** Line sink, `console.log`-shaped */
export type LineSink = (line: string) => void;

export interface LoggerOptions {
  /** Prefix every line with an ISO timestamp */
  timestamps?: boolean;
  /** Drop informational lines; warnings are still written */
  quiet?: boolean;
  /** Progress stream (default: stdout) */
  out?: LineSink;
  /** Diagnostic stream (default: stderr) */
  err?: LineSink;
  /** Clock used for timestamps */
  now?: () => Date;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Create a logger. Components receive it explicitly instead of reading
 * process-wide logging state.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const format = (message: string): string =>
    options.timestamps ? `[${now().toISOString()}] ${message}` : message;

  return {
    info(message) {
      if (!options.quiet) out(format(message));
    },
    warn(message) {
      err(format(`Warning: ${message}`));
    },
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  info() {},
  warn() {},
};
