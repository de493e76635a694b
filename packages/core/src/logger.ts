/**
 * Scoped console logging.
 *
 * Lines are prefixed with `[pegforge:<scope>]`. Debug lines are printed only
 * when the logger is verbose or `debug` is set in the configuration.
 */

import { config } from "./config.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /** A logger for a sub-pass, sharing this logger's settings. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Receives stdout lines (default: console.log) */
  writer?: (line: string) => void;
  /** Receives stderr lines (default: console.error) */
  errorWriter?: (line: string) => void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[pegforge:${scope}]`;
  const out = options.writer ?? ((line: string) => console.log(line));
  const err = options.errorWriter ?? ((line: string) => console.error(line));
  const debugEnabled = (): boolean => options.verbose ?? (config.has("debug") || config.has("verbose"));

  return {
    debug(message) {
      if (debugEnabled()) out(`${prefix} ${message}`);
    },
    info(message) {
      out(`${prefix} ${message}`);
    },
    warn(message) {
      err(`${prefix} warning: ${message}`);
    },
    child(child) {
      return createLogger(`${scope}:${child}`, options);
    },
  };
}

/** Logger that drops everything; the default for library entry points. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  child() {
    return silentLogger;
  },
};
