/**
 * Scoped logging.
 *
 * Lines are prefixed with `[numeris:<scope>]` and go through a single
 * writer (default: console.error). Debug lines are only written when the
 * `debug` config flag is on.
 *
 * @example
 * ```typescript
 * const log = createLogger("bool-vector");
 * log.debug("masked padding bits");   // [numeris:bool-vector] masked padding bits
 * ```
 */

import { config } from "./config.js";
import { writeLine } from "./writer.js";

export { setLogWriter, type LogLevel, type LogWriter } from "./writer.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  return {
    scope,
    debug(message) {
      if (config.has("debug")) writeLine(scope, "debug", message);
    },
    warn(message) {
      writeLine(scope, "warn", message);
    },
    error(message) {
      writeLine(scope, "error", message);
    },
  };
}
