export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let currentLevel: LogLevel = "info";

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

// Keys whose values are replaced before structured data is printed
const SECRET_KEYS = new Set([
  "password",
  "password_encrypted",
  "secretkey",
  "secret_key",
  "s3_secret_key",
  "accesskey",
  "access_key",
  "s3_access_key",
  "encryptionkey",
  "webhookurl",
  "pgpassword",
  "privatekey",
  "private_key",
]);

export const REDACTED = "[redacted]";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

/**
 * Deep copy of `data` with values under secret-looking keys replaced
 */
export function redact(data: unknown): unknown {
  if (Array.isArray(data)) {
    return data.map(redact);
  }
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (data !== null && typeof data === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redact(value);
    }
    return result;
  }
  return data;
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  scope?: string,
): string {
  const timestamp = formatTimestamp();
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let formatted = `${color}[${timestamp}] ${levelStr}${RESET}${scopeStr} ${message}`;

  if (data !== undefined) {
    if (typeof data === "object") {
      formatted += ` ${JSON.stringify(redact(data), null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

function write(level: LogLevel, message: string, data?: unknown, scope?: string): void {
  if (!shouldLog(level)) {
    return;
  }
  const line = formatMessage(level, message, data, scope);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Logger that tags every line with a component name, e.g. `[scheduler]`
 */
export function createLogger(scope: string): ScopedLogger {
  return {
    debug: (message, data) => write("debug", message, data, scope),
    info: (message, data) => write("info", message, data, scope),
    warn: (message, data) => write("warn", message, data, scope),
    error: (message, data) => write("error", message, data, scope),
  };
}
