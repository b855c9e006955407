import { Logger } from "tslog";

/**
 * Keys whose string values never reach log output. Tool arguments and
 * provider payloads are logged, and either may carry credentials.
 */
const SENSITIVE_KEY_PATTERNS = [
  /token/i,
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /auth/i,
  /credential/i,
];

const MASKED_KEYS = [
  "token",
  "password",
  "secret",
  "apiKey",
  "api_key",
  "credential",
  "authorization",
];

/**
 * Recursively redact sensitive values from objects before logging.
 */
export function redactSensitive(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value;

  if (Array.isArray(value)) {
    return value.map(redactSensitive);
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isSensitiveKey(key) && typeof entry === "string") {
      result[key] = "[REDACTED]";
    } else {
      result[key] = redactSensitive(entry);
    }
  }
  return result;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export interface LoggerOptions {
  level?: LogLevel;
  redact?: boolean;
}

export type AppLogger = Logger<unknown>;

export function createLogger(name: string, options?: LoggerOptions): AppLogger {
  const level = options?.level ?? "info";
  const shouldRedact = options?.redact !== false;

  return new Logger({
    name: `conduit:${name}`,
    minLevel: LOG_LEVEL_MAP[level],
    type: "pretty",
    ...(shouldRedact && {
      maskValuesOfKeys: MASKED_KEYS,
      maskPlaceholder: "[REDACTED]",
    }),
  });
}
