// =============================================================================
// Logger — Structured pipeline event logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  documentId?: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Custom sink (defaults to console) */
  sink?: LogSink;
  /** Minimum level emitted (default: "info") */
  level?: LogLevel;
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  /** Logger that stamps every entry with the given document id. */
  child(bindings: { documentId: string }): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const consoleSink: LogSink = (entry) => {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
  const doc = entry.documentId ? ` (${entry.documentId.slice(0, 12)})` : "";
  // eslint-disable-next-line no-console
  const write = entry.level === "error" || entry.level === "warn" ? console.error : console.log;
  write(`${prefix} ${entry.event}${doc}`, entry.data ?? "");
};

export function createLogger(options: LoggerOptions = {}, documentId?: string): Logger {
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold) return;
    sink({ timestamp: Date.now(), level, event, documentId, data });
  }

  return {
    debug: (event, data) => emit("debug", event, data),
    info: (event, data) => emit("info", event, data),
    warn: (event, data) => emit("warn", event, data),
    error: (event, data) => emit("error", event, data),
    child: (bindings) => createLogger(options, bindings.documentId),
  };
}

/** Sink that keeps entries in memory; handy for asserting on emitted events. */
export function createMemorySink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { sink: (entry) => entries.push(entry), entries };
}
