/**
 * Leveled console logging.
 *
 * Production (NODE_ENV=production) writes one JSON object per line so the
 * output can be shipped as-is; everything else gets a short readable line.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: LogContext;
  error?: { name: string; message: string; stack?: string };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SILENT":
      return LogLevel.SILENT;
    default:
      return process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
  }
}

function toErrorInfo(error: unknown): LogEntry["error"] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
}

function format(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const time = entry.timestamp.slice(11, 19);
  let line = `[${time}] ${entry.level.padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, error?: unknown): void;
  error(message: string, context?: LogContext, error?: unknown): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const json = options.json ?? process.env.NODE_ENV === "production";
  const prefix = scope ? `[${scope}] ` : "";

  const write = (
    entryLevel: Exclude<LogLevel, LogLevel.SILENT>,
    message: string,
    context?: LogContext,
    error?: unknown
  ): void => {
    if (entryLevel < level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[entryLevel],
      message: prefix + message,
    };
    if (context && Object.keys(context).length > 0) entry.context = context;
    if (error !== undefined) entry.error = toErrorInfo(error);

    const line = format(entry, json);
    if (entryLevel === LogLevel.ERROR) {
      console.error(line);
    } else if (entryLevel === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write(LogLevel.DEBUG, message, context),
    info: (message, context) => write(LogLevel.INFO, message, context),
    warn: (message, context, error) => write(LogLevel.WARN, message, context, error),
    error: (message, context, error) => write(LogLevel.ERROR, message, context, error),
    child: (childScope) =>
      createLogger(scope ? `${scope}:${childScope}` : childScope, { level, json }),
  };
}

export const logger = createLogger();
