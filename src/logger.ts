export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createConsoleLogger(): Logger {
  return {
    debug: (...args: unknown[]) => console.debug("[bydhvs]", ...args),
    info: (...args: unknown[]) => console.info("[bydhvs]", ...args),
    warn: (...args: unknown[]) => console.warn("[bydhvs]", ...args),
    error: (...args: unknown[]) => console.error("[bydhvs]", ...args),
  };
}

/** Pick the logger for a set of options: explicit, verbose console, or silent. */
export function resolveLogger(options: { logger?: Logger; verbose?: boolean }): Logger {
  if (options.logger) return options.logger;
  if (options.verbose) return createConsoleLogger();
  return nullLogger;
}
