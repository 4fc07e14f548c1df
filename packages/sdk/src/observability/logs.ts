/**
 * Structured logging for build, open and query operations
 * All logs go to stderr so stdout stays free for callers (the CLI prints results there)
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  key?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Sink for formatted log lines (replaceable in tests)
 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

/**
 * Resolve the minimum level from PAKDB_LOG_LEVEL
 * @returns Level, or null when logging is silenced
 */
export function resolveLogLevel(raw = process.env.PAKDB_LOG_LEVEL): LogLevel | null {
  const value = raw?.trim().toLowerCase();
  if (value === "silent") return null;
  const level = LEVELS.find((l) => l === value);
  return level ?? "warn";
}

export class Logger {
  #minLevel: LogLevel | null;
  #enabled = true;
  #sink: LogSink;

  constructor(minLevel: LogLevel | null = "warn", sink: LogSink = stderrSink) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  #shouldLog(level: LogLevel): boolean {
    if (!this.#enabled || this.#minLevel === null) return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<Omit<LogEntry, "ts" | "level" | "event">>): void {
    if (!this.#shouldLog(level)) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(entry, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value
    ));
  }

  debug(event: string, data?: Partial<Omit<LogEntry, "ts" | "level" | "event">>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<Omit<LogEntry, "ts" | "level" | "event">>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<Omit<LogEntry, "ts" | "level" | "event">>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<Omit<LogEntry, "ts" | "level" | "event">>): void {
    this.log("error", event, data);
  }

  /**
   * Change the minimum level; null silences all output
   */
  setLevel(level: LogLevel | null): void {
    this.#minLevel = level;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Redirect output (returns the previous sink)
   */
  setSink(sink: LogSink): LogSink {
    const previous = this.#sink;
    this.#sink = sink;
    return previous;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger(resolveLogLevel());
