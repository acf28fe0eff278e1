export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Diagnostics go to stderr so that stdout only ever carries the report.
 * Without `verbose` every call is a no-op.
 */
export function createLogger(verbose: boolean): Logger {
  return {
    debug(message, context) {
      if (!verbose) return;
      if (context) {
        console.error(message, context);
      } else {
        console.error(message);
      }
    },
  };
}

export const silentLogger: Logger = createLogger(false);
