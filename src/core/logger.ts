import type { JsonObject } from "./json.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string, data?: JsonObject): void;
  info(message: string, data?: JsonObject): void;
  warn(message: string, data?: JsonObject): void;
  error(message: string, data?: JsonObject): void;
}

export interface LogLine {
  ts: string;
  level: LogLevel;
  logger: string;
  message: string;
  [key: string]: unknown;
}

export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line + "\n");
};

/**
 * JSON-lines logger. Writes to stderr by default; stdout carries the MCP stdio
 * transport and must stay clean.
 */
export function createLogger(opts: { name: string; level?: LogLevel; write?: LogWriter }): Logger {
  const threshold = LOG_LEVELS.indexOf(opts.level ?? "info");
  const write = opts.write ?? stderrWriter;

  const emit = (level: LogLevel, message: string, data?: JsonObject): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const line: LogLine = { ...data, ts: new Date().toISOString(), level, logger: opts.name, message };
    write(JSON.stringify(line));
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data)
  };
}
