import fs from "fs";
import path from "path";

/**
 * JSON event logger shared by the pipeline steps, the HTTP layer and the
 * walkthrough script.
 *
 * - `log(level, message, meta)` writes `{ timestamp, level, message, ...meta }`.
 * - `event(type, payload)` writes `{ timestamp, type, ...payload }` at info level.
 * - Entries go to the console and, unless `LOG_FILE=off`, to `logs/app.log`.
 * - `LOG_LEVEL` drops entries below the threshold.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEYS = new Set([
  "apikey",
  "api_key",
  "key",
  "encoded_api_key",
  "authorization",
  "password",
]);

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentThreshold(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function currentLogFile(): string | null {
  const raw = process.env.LOG_FILE;
  if (raw === "off" || raw === "") {
    return null;
  }
  return raw ?? path.join(process.cwd(), "logs", "app.log");
}

export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value && typeof value === "object" && !(value instanceof Error)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SECRET_KEYS.has(k.toLowerCase()) ? "***" : redactSecrets(v);
    }
    return out;
  }
  return value;
}

function shouldWrite(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentThreshold()];
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (!shouldWrite(level)) {
    return;
  }

  const safe = redactSecrets(entry);

  if (level === "error") {
    console.error(safe);
  } else {
    console.log(safe);
  }

  const logFile = currentLogFile();
  if (!logFile) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.appendFileSync(logFile, JSON.stringify(safe) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
