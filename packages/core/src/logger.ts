/**
 * Scoped debug logging.
 *
 * Lines are prefixed with `[lazyproxy:<scope>]`. Debug lines are written only
 * while the `debug` configuration flag is on; warnings are always written.
 */

import { config } from "./config.js";

export interface LoggerOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

export interface Logger {
  readonly scope: string;
  isDebugEnabled(): boolean;
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.error(line));
  const prefix = `[lazyproxy:${scope}]`;

  // Read on every call so config.set() and config.reset() take effect at once.
  const isDebugEnabled = (): boolean => config.get("debug") === true;

  return {
    scope,
    isDebugEnabled,
    debug(message) {
      if (isDebugEnabled()) {
        writer(`${prefix} ${message}`);
      }
    },
    warn(message) {
      writer(`${prefix} warning: ${message}`);
    },
  };
}
