// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export interface LogContext {
  routerId?: string;
  component?: string;
  serviceId?: string;
  instanceId?: string;
  cid?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

function formatContext(context: LogContext): string {
  return Object.entries(context)
    .filter(([_, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");
}

/**
 * Default console log handler that formats entries for terminal output.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { level, message, context, timestamp, error } = entry;
  const ctx = formatContext(context);
  const prefix = ctx ? `[${ctx}]` : "";
  const formatted = `${timestamp.toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (error) {
        console.error(error);
      }
      break;
  }
};

/**
 * Writes one JSON object per line, for log shippers.
 */
export const jsonLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    ts: entry.timestamp.toISOString(),
    level: entry.level,
    msg: entry.message,
    ...entry.context,
    ...(entry.error
      ? { error: entry.error.message, stack: entry.error.stack }
      : {}),
  });
  process.stdout.write(`${line}\n`);
};

class LoggerConfig {
  private _level: LogLevel = "info";
  private _handler: LogHandler = consoleLogHandler;

  get level(): LogLevel {
    return this._level;
  }

  set level(level: LogLevel) {
    this._level = level;
  }

  get handler(): LogHandler {
    return this._handler;
  }

  set handler(handler: LogHandler) {
    this._handler = handler;
  }

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    if (options.level !== undefined) {
      this._level = options.level;
    }
    if (options.handler !== undefined) {
      this._handler = options.handler;
    }
  }
}

/**
 * Process-wide logger configuration shared by every Logger.
 */
export const loggerConfig = new LoggerConfig();

/**
 * A structured logger carrying router/service context.
 */
export class Logger {
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[loggerConfig.level];
  }

  private log(
    level: LogLevel,
    message: string,
    extra?: LogContext,
    error?: Error,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }

  debug(message: string, extra?: LogContext): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: LogContext): void {
    this.log("warn", message, extra);
  }

  /**
   * Logs at error level. Non-Error throwables are wrapped so handlers
   * always receive an Error.
   */
  error(message: string, error?: unknown, extra?: LogContext): void {
    const normalized =
      error === undefined || error instanceof Error
        ? error
        : new Error(String(error));
    this.log("error", message, extra, normalized);
  }
}

export function createLogger(component: string, routerId?: string): Logger {
  return new Logger({ component, routerId });
}
