// stdout carries the MCP transport, so every log line goes to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const v = value?.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return null;
}

let threshold: LogLevel = parseLogLevel(process.env.FOLDBENCH_LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function emit(level: LogLevel, name: string, message: string, err?: unknown): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const line = `${new Date().toISOString()} ${level.toUpperCase()} [${name}] ${message}`;
  if (err instanceof Error && err.stack) {
    console.error(`${line}\n${err.stack}`);
    return;
  }
  if (err !== undefined) {
    console.error(`${line}\n${String(err)}`);
    return;
  }
  console.error(line);
}

export function getLogger(name: string): Logger {
  return {
    debug: (message) => emit("debug", name, message),
    info: (message) => emit("info", name, message),
    warn: (message) => emit("warn", name, message),
    error: (message, err) => emit("error", name, message, err)
  };
}
