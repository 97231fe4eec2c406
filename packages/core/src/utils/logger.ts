/**
 * Structured logger used by the service and its adapters.
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Default logger - discards everything
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Console logger, for development
 */
export function createConsoleLogger(prefix = "netcall"): Logger {
  return {
    info: (message, meta) => {
      console.info(`[${prefix}] [INFO] ${message}`, meta ?? "");
    },
    warn: (message, meta) => {
      console.warn(`[${prefix}] [WARN] ${message}`, meta ?? "");
    },
    error: (message, meta) => {
      console.error(`[${prefix}] [ERROR] ${message}`, meta ?? "");
    },
    debug: (message, meta) => {
      console.debug(`[${prefix}] [DEBUG] ${message}`, meta ?? "");
    },
  };
}
