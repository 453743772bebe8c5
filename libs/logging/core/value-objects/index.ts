/**
 * Severity of a structured log event, ordered from least to most severe.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARNING = "warning",
  ERROR = "error",
}

export const LOG_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARNING,
  LogLevel.ERROR,
];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Output encoding of the log sink.
 *
 * JSON: one machine-parsable JSON object per line
 * CONSOLE: human-readable key-value text (pino-pretty)
 */
export enum LogRenderer {
  JSON = "json",
  CONSOLE = "console",
}

export function isLogRenderer(value: unknown): value is LogRenderer {
  return value === LogRenderer.JSON || value === LogRenderer.CONSOLE;
}

/**
 * Global error codes used when an error carries no code of its own.
 * Domain-specific codes live with their modules.
 */
export enum ErrorCode {
  BAD_REQUEST = "BAD_REQUEST",
  UNAUTHORIZED = "UNAUTHORIZED",
  FORBIDDEN = "FORBIDDEN",
  NOT_FOUND = "NOT_FOUND",
  CONFLICT = "CONFLICT",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  RATE_LIMITED = "RATE_LIMITED",
  INTERNAL_ERROR = "INTERNAL_ERROR",
  BAD_GATEWAY = "BAD_GATEWAY",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
  GATEWAY_TIMEOUT = "GATEWAY_TIMEOUT",
  UNKNOWN = "UNKNOWN",
}
