// log.ts - Component loggers
//
// Standard output carries data lines only. Every diagnostic goes to stderr
// with a bracketed component prefix.

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isDebugEnabled(env: Record<string, string | undefined> = process.env): boolean {
  return env.THERMO_DEBUG === '1';
}

export function createLogger(component: string, opts?: { debug?: boolean }): Logger {
  const prefix = `[${component}]`;
  const debug = opts?.debug ?? isDebugEnabled();
  return {
    debug(message) {
      if (debug) console.error(`${prefix} ${message}`);
    },
    info(message) {
      console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} Warning: ${message}`);
    },
    error(message) {
      console.error(`${prefix} Error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
