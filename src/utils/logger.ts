export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_ENV = "N8N_DEPLOY_LOG_LEVEL";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_PRIORITY, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return currentLevel === "debug" && data.stack ? data.stack : data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);

  let formatted = `${LEVEL_COLORS[level]}[${timestamp}] ${levelStr}${RESET} ${message}`;

  if (data !== undefined) {
    formatted += ` ${formatData(data)}`;
  }

  return formatted;
}

export function debug(message: string, data?: unknown): void {
  if (shouldLog("debug")) {
    console.log(formatMessage("debug", message, data));
  }
}

export function info(message: string, data?: unknown): void {
  if (shouldLog("info")) {
    console.log(formatMessage("info", message, data));
  }
}

export function warn(message: string, data?: unknown): void {
  if (shouldLog("warn")) {
    console.warn(formatMessage("warn", message, data));
  }
}

export function error(message: string, data?: unknown): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message, data));
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
