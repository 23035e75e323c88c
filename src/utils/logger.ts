export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const REDACTED_KEYS = new Set(["token", "accessToken", "clientSecret", "authorization"]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env["LOG_LEVEL"];
let defaultLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

/** Change the minimum level for every logger created without an explicit level. */
export function setLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

function redact(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = REDACTED_KEYS.has(key) ? "[REDACTED]" : value;
  }
  return out;
}

export function createLogger(module: string, minLevel?: LogLevel): Logger {
  function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel ?? defaultLevel]) return;

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      ...(data ? redact(data) : {}),
    };

    switch (level) {
      case "error":
        console.error(JSON.stringify(entry));
        break;
      case "warn":
        console.warn(JSON.stringify(entry));
        break;
      default:
        console.log(JSON.stringify(entry));
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
  };
}
