/**
 * Structured logging for read, write, cache and lock events
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Where formatted log lines go (console by default)
 */
export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Lowest level that is written (default: "info", "debug" when PATHTABLE_DEBUG is set) */
  minLevel?: LogLevel;
  writer?: LogWriter;
}

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;
  #writer: LogWriter;

  constructor(options: LoggerOptions = {}) {
    this.#minLevel = options.minLevel ?? (process.env.PATHTABLE_DEBUG ? "debug" : "info");
    this.#writer = options.writer ?? consoleWriter;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.path) {
      parts.push(entry.path);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#writer(level, parts.join(" "));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
