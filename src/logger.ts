// ─── Logging ────────────────────────────────────────────────────────────────────
// Console-backed logger injected into every component. The core never owns a
// transport; hosts pass their own implementation to route lines elsewhere.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const DEBUG_ENABLED = process.env.LOG_LEVEL === "debug";

export interface ConsoleLoggerOptions {
  /** Send info lines to stderr as well, keeping stdout for data. Default: false */
  stderrOnly?: boolean;
}

/**
 * Creates a console logger that prefixes every line with `[LEVEL] [component]`.
 * Debug lines are dropped unless LOG_LEVEL=debug.
 */
export function createConsoleLogger(component: string, options: ConsoleLoggerOptions = {}): Logger {
  const infoSink = options.stderrOnly ? console.error : console.log;
  return {
    debug: (msg, ...args) => {
      if (DEBUG_ENABLED) console.error(`[DEBUG] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => infoSink(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}

/** Discards everything. Used by tests and by hosts that log elsewhere. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
