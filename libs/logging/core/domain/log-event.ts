import { LogLevel, isLogLevel } from "@logging/value-objects";

export type LogFields = Readonly<Record<string, unknown>>;

/**
 * LogEvent - one rendered structured record as it leaves the sink.
 *
 * Required keys are always present; bound context (`user`, `route`,
 * `method`, `request_id`, `user_agent`) and call-site fields sit beside them.
 */
export interface LogEvent {
  event: string;
  level: LogLevel;
  logger: string;
  timestamp: string;
  [field: string]: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isLogEvent(value: unknown): value is LogEvent {
  return (
    isRecord(value) &&
    typeof value.event === "string" &&
    isLogLevel(value.level) &&
    typeof value.logger === "string" &&
    typeof value.timestamp === "string"
  );
}

/**
 * Drop keys whose value is undefined so that an absent field is
 * never rendered as a placeholder.
 */
export function compactFields(fields: Record<string, unknown>): LogFields {
  const compacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) compacted[key] = value;
  }
  return compacted;
}
