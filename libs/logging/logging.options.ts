import type { DestinationStream } from "pino";
import { LogLevel, LogRenderer } from "@logging/value-objects";

export const LOGGING_OPTIONS = Symbol("LOGGING_OPTIONS");

/**
 * Process-wide logging configuration, built once at startup and injected
 * into the sink. Tests replace it to capture records in memory.
 */
export interface LoggingOptions {
  /** Records below this level are dropped. */
  level: LogLevel;
  renderer: LogRenderer;
  /** Header carrying the mock username, matched case-insensitively. */
  userHeader: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}
