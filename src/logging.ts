export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/**
 * Console logger that prefixes every line with a subsystem tag,
 * e.g. `[Executor] Started`. Debug lines only show with NIGHTSHIFT_DEBUG set.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...meta) {
      if (process.env.NIGHTSHIFT_DEBUG) {
        console.debug(prefix, message, ...meta);
      }
    },
    info(message, ...meta) {
      console.log(prefix, message, ...meta);
    },
    warn(message, ...meta) {
      console.warn(prefix, message, ...meta);
    },
    error(message, ...meta) {
      console.error(prefix, message, ...meta);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
