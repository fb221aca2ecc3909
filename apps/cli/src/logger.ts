/**
 * Diagnostics go to stderr with a level prefix; stdout is reserved for data.
 */

export interface CliLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(verbose: boolean): CliLogger {
  return {
    info: (message) => {
      if (verbose) console.error(`[INFO] ${message}`);
    },
    warn: (message) => console.error(`[WARN] ${message}`),
    error: (message) => console.error(`[ERROR] ${message}`),
  };
}
