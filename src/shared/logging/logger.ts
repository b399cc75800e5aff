import fs from "fs";
import path from "path";

export type LogLevel = "info" | "warn" | "error";
export type LogFields = Record<string, unknown>;

export interface Logger {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

export type LogSink = (line: string, level: LogLevel) => void;

export type LoggerOptions = {
  logFile?: string;
  now?: () => Date;
  sink?: LogSink;
};

const consoleSink: LogSink = (line, level) => {
  /* eslint-disable no-console */
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
  /* eslint-enable no-console */
};

const serializeError = (value: unknown): unknown => {
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
};

/**
 * One JSON line per event. When `logFile` is set every line is also appended
 * to it.
 */
export const createLogger = (opts: LoggerOptions = {}): Logger => {
  const { logFile, now = () => new Date(), sink = consoleSink } = opts;
  if (logFile) fs.mkdirSync(path.dirname(logFile), { recursive: true });

  const write = (level: LogLevel, event: string, fields: LogFields = {}) => {
    const payload: LogFields = { ts: now().toISOString(), level, event };
    for (const [key, value] of Object.entries(fields)) {
      payload[key] = serializeError(value);
    }
    const line = JSON.stringify(payload);
    sink(line, level);
    if (logFile) fs.appendFileSync(logFile, `${line}\n`);
  };

  return {
    info: (event, fields) => write("info", event, fields),
    warn: (event, fields) => write("warn", event, fields),
    error: (event, fields) => write("error", event, fields)
  };
};
