/**
 * Tagged console logger
 *
 * Every line is prefixed with its scope, e.g. "[StoreKit] Connected".
 * Errors are always written; everything else only when the logger is enabled.
 */

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export type LoggerOptions = {
  /** Defaults to true outside NODE_ENV=production */
  enabled?: boolean;
};

function defaultEnabled(): boolean {
  return typeof process === "undefined" || process.env.NODE_ENV !== "production";
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const enabled = options.enabled ?? defaultEnabled();
  const prefix = `[${scope}]`;

  return {
    debug: (...args) => {
      if (enabled) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled) console.warn(prefix, ...args);
    },
    error: (...args) => {
      console.error(prefix, ...args);
    },
  };
}
