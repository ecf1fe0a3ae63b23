/**
 * The single sink every log line goes through (default: console.error).
 */

export type LogLevel = "debug" | "warn" | "error";

export type LogWriter = (line: string, level: LogLevel) => void;

const defaultWriter: LogWriter = (line) => console.error(line);

let writer: LogWriter = defaultWriter;

/**
 * Replace the writer used by every logger. Pass nothing to restore the default.
 * Returns the writer that was active before the call.
 */
export function setLogWriter(next?: LogWriter): LogWriter {
  const previous = writer;
  writer = next ?? defaultWriter;
  return previous;
}

/** Format and write one `[numeris:<scope>]` line. */
export function writeLine(scope: string, level: LogLevel, message: string): void {
  const tag = level === "debug" ? "" : `${level}: `;
  writer(`[numeris:${scope}] ${tag}${message}`, level);
}
