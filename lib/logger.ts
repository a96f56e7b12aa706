/**
 * Tagged console logging, e.g. "[profile] formula fallback { ... }".
 * Debug lines are dropped unless the caller turns them on.
 */

export type Logger = {
  debug: (message: string, ctx?: Record<string, unknown>) => void;
  warn: (message: string, ctx?: Record<string, unknown>) => void;
  error: (message: string, ctx?: Record<string, unknown>) => void;
};

export function createLogger(tag: string, options: { debug?: boolean } = {}): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ctx) {
      if (!options.debug) return;
      if (ctx) console.log(prefix, message, ctx);
      else console.log(prefix, message);
    },
    warn(message, ctx) {
      if (ctx) console.warn(prefix, message, ctx);
      else console.warn(prefix, message);
    },
    error(message, ctx) {
      if (ctx) console.error(prefix, message, ctx);
      else console.error(prefix, message);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
