/**
 * Scoped console logging.
 *
 * Every line is prefixed with `[pullstream:<scope>]`. Debug output is gated
 * by `config.isDebug()` (set `PULLSTREAM_DEBUG=1` or `debug: true` in a
 * config file); the other levels always write.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[pullstream:${scope}]`;
  return {
    scope,
    debug: (...args: unknown[]) => {
      if (config.isDebug()) console.debug(prefix, ...args);
    },
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
  };
}
