import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

let minLevel: LogLevel =
  config.logLevel ?? (config.nodeEnv === "production" ? "info" : "debug");

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

export function formatEntry(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>
): string {
  return JSON.stringify({
    level,
    timestamp: new Date().toISOString(),
    event,
    ...data,
  });
}

function log(level: LogLevel, event: string, data?: Record<string, unknown>) {
  if (!shouldLog(level)) return;

  const output = formatEntry(level, event, data);

  if (level === "error" || level === "critical") {
    console.error(output);
  } else if (level === "warn") {
    console.warn(output);
  } else {
    console.log(output);
  }
}

/** Change the minimum level at runtime (tests silence debug noise with this). */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/** Shorten caller speech before it goes into a log line. */
export function truncateForLog(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export const logger = {
  debug: (event: string, data?: Record<string, unknown>) => log("debug", event, data),
  info: (event: string, data?: Record<string, unknown>) => log("info", event, data),
  warn: (event: string, data?: Record<string, unknown>) => log("warn", event, data),
  error: (event: string, data?: Record<string, unknown>) => log("error", event, data),
  critical: (event: string, data?: Record<string, unknown>) => log("critical", event, data),
};
