/**
 * packages/core/src/diagnostics/logger.ts — Injected logging for the core.
 *
 * The core never writes to the console directly. Every component receives a
 * Logger; messages carry a `[widgetflow][<area>]` prefix. Warnings that could
 * fire every frame go through `createWarnOnce` so each key is reported once.
 */

export type LogLevel = "debug" | "warn" | "error";

export type LogRecord = Readonly<{ level: LogLevel; message: string }>;

export type LogSink = (level: LogLevel, message: string) => void;

export type Logger = Readonly<{
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

export type LoggerOptions = Readonly<{
  sink?: LogSink;
  /** Records below this level are dropped. Default: "warn". */
  minLevel?: LogLevel;
}>;

export type LogArea = "link" | "tree" | "spatial" | "events" | "focus" | "scheduler";

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 0,
  warn: 1,
  error: 2,
});

export const consoleSink: LogSink = (level, message) => {
  if (level === "error") {
    console.error(message);
  } else if (level === "warn") {
    console.warn(message);
  } else {
    console.debug(message);
  }
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const sink = opts.sink ?? consoleSink;
  const minRank = LEVEL_RANK[opts.minLevel ?? "warn"];
  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < minRank) return;
    sink(level, message);
  };
  return Object.freeze({
    debug: (message: string) => emit("debug", message),
    warn: (message: string) => emit("warn", message),
    error: (message: string) => emit("error", message),
  });
}

/** Logger that drops everything. */
export const silentLogger: Logger = Object.freeze({
  debug: () => {},
  warn: () => {},
  error: () => {},
});

export type MemoryLogger = Logger &
  Readonly<{
    records: () => readonly LogRecord[];
    messages: (level?: LogLevel) => readonly string[];
    clear: () => void;
  }>;

/** Logger that keeps every record in memory, at every level. */
export function createMemoryLogger(): MemoryLogger {
  const records: LogRecord[] = [];
  const push = (level: LogLevel, message: string): void => {
    records.push(Object.freeze({ level, message }));
  };
  return Object.freeze({
    debug: (message: string) => push("debug", message),
    warn: (message: string) => push("warn", message),
    error: (message: string) => push("error", message),
    records: () => records.slice(),
    messages: (level?: LogLevel) =>
      records.filter((r) => level === undefined || r.level === level).map((r) => r.message),
    clear: () => {
      records.length = 0;
    },
  });
}

export function formatLogMessage(area: LogArea, detail: string): string {
  return `[widgetflow][${area}] ${detail}`;
}

export type WarnOnce = (key: string, area: LogArea, detail: string) => void;

export function createWarnOnce(logger: Logger): WarnOnce {
  const warned = new Set<string>();
  return (key, area, detail) => {
    if (warned.has(key)) return;
    warned.add(key);
    logger.warn(formatLogMessage(area, detail));
  };
}
