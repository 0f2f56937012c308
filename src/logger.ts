/**
 * @module logger
 * @description Structured JSON logging for connection lifecycle and call
 * failures. One JSON object per line: `{ level, msg, ...fields }`.
 *
 * Byte contents are never passed to the logger; callers log lengths and
 * error kinds only.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export type LogFields = Readonly<Record<string, string | number | boolean | null>>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export type LogSink = (line: string) => void;

const RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger writing one JSON line per entry at or above `level`.
 *
 * @example
 * ```ts
 * const log = createConsoleLogger("info", { component: "invoker" });
 * log.warn("connection invalidated", { pending: 2 });
 * // {"level":"warn","msg":"connection invalidated","component":"invoker","pending":2}
 * ```
 */
export function createConsoleLogger(
  level: LogLevel = "info",
  base: LogFields = {},
  sink: LogSink = (line) => console.log(line)
): Logger {
  const write =
    (entryLevel: Exclude<LogLevel, "silent">) =>
    (msg: string, fields: LogFields = {}): void => {
      if (RANK[entryLevel] < RANK[level]) return;
      sink(JSON.stringify({ level: entryLevel, msg, ...base, ...fields }));
    };
  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Derive a logger that adds `fields` to every entry. */
export function childLogger(parent: Logger, fields: LogFields): Logger {
  return {
    debug: (msg, extra) => parent.debug(msg, { ...fields, ...extra }),
    info: (msg, extra) => parent.info(msg, { ...fields, ...extra }),
    warn: (msg, extra) => parent.warn(msg, { ...fields, ...extra }),
    error: (msg, extra) => parent.error(msg, { ...fields, ...extra }),
  };
}
