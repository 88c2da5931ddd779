/**
 * Tagged console logging.
 *
 * Every line carries its component tag (`[overlay]`, `[socket]`, `[bridge]`).
 * debug() is silent unless the logger was created with debug enabled.
 */

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${tag}]`;
  const write = (sink: (...args: unknown[]) => void, message: string, details: unknown) => {
    if (details === undefined) {
      sink(prefix, message);
    } else {
      sink(prefix, message, details);
    }
  };
  return {
    debug(message, details) {
      if (options.debug) write(console.log, message, details);
    },
    info(message, details) {
      write(console.log, message, details);
    },
    warn(message, details) {
      write(console.warn, message, details);
    },
    error(message, details) {
      write(console.error, message, details);
    },
  };
}

/** Logger that drops everything. */
export const SILENT_LOGGER: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
