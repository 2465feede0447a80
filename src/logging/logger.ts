// =============================================================================
// Logger — Structured event logging with a pluggable sink
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  /** Component that emitted the entry, e.g. "coordinator" */
  scope?: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Custom sink (defaults to one console line per entry) */
  sink?: LogSink;
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
  scope?: string;
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  /** Same sink and level, entries tagged with a different scope */
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const consoleSink: LogSink = (entry) => {
  const scope = entry.scope ? ` [${entry.scope}]` : "";
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]${scope}`;
  const line = entry.data ? `${prefix} ${entry.event} ${JSON.stringify(entry.data)}` : `${prefix} ${entry.event}`;
  // eslint-disable-next-line no-console
  if (entry.level === "error") console.error(line);
  // eslint-disable-next-line no-console
  else if (entry.level === "warn") console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
};

export const silentSink: LogSink = () => {};

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold) return;
    sink({
      timestamp: Date.now(),
      level,
      event,
      scope: options.scope,
      data,
    });
  }

  return {
    debug: (event, data) => emit("debug", event, data),
    info: (event, data) => emit("info", event, data),
    warn: (event, data) => emit("warn", event, data),
    error: (event, data) => emit("error", event, data),
    child: (scope) => createLogger({ ...options, scope }),
  };
}

/** Serializable view of an unknown thrown value for log payloads. */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const described: Record<string, unknown> = { name: err.name, message: err.message };
    if ("code" in err && typeof err.code === "string") described.code = err.code;
    return described;
  }
  return { message: String(err) };
}
