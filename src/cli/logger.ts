/**
 * Console output for the CLI. Results go to stdout, everything else to stderr.
 */

export interface Logger {
  /** Command output */
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only printed with --verbose */
  debug(message: string): void;
}

export function createLogger(verbose: boolean): Logger {
  return {
    info: message => console.log(message),
    warn: message => console.warn(`Warning: ${message}`),
    error: message => console.error(`Error: ${message}`),
    debug: message => {
      if (verbose) {
        console.error(`[lutgrid] ${message}`);
      }
    },
  };
}
