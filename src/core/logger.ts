/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "").toLowerCase().trim();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "info";
}

// Read directly from the environment: config.ts is loaded after the logger in some entry points.
const threshold = LEVEL_ORDER[parseLevel(process.env.LOG_LEVEL)];

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold;
}

function ts(): string {
  return new Date().toISOString();
}

export const logger = {
  debug: (msg: string, meta?: unknown) => {
    if (enabled("debug")) console.debug(`[${ts()}] [DEBUG] ${msg}`, meta ?? "");
  },
  info: (msg: string, meta?: unknown) => {
    if (enabled("info")) console.info(`[${ts()}] [INFO] ${msg}`, meta ?? "");
  },
  warn: (msg: string, meta?: unknown) => {
    if (enabled("warn")) console.warn(`[${ts()}] [WARN] ${msg}`, meta ?? "");
  },
  error: (msg: string, meta?: unknown) => {
    if (enabled("error")) console.error(`[${ts()}] [ERROR] ${msg}`, meta ?? "");
  }
};

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
