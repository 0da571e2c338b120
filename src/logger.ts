// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/**
 * Console-backed logger. Debug output is suppressed unless `verbose` is set.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): ServerLogger {
  const { verbose = false } = options;
  return {
    info: (msg, ...args) => console.log(`[INFO] [${ts()}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${ts()}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${ts()}] ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (verbose) console.debug(`[DEBUG] [${ts()}] ${msg}`, ...args);
    },
  };
}

export const defaultLogger: ServerLogger = createConsoleLogger();
