import { LogLevel } from "@logging/value-objects";

/**
 * LoggerPort - the sink every bound logger writes through.
 * Implementations own rendering, level filtering and the destination stream.
 */
export abstract class LoggerPort {
  /**
   * Write one structured record. `fields` is already merged
   * (bound fields overridden by per-call fields).
   */
  abstract write(
    level: LogLevel,
    event: string,
    fields: Readonly<Record<string, unknown>>,
  ): void;

  /**
   * Whether records at `level` pass the configured threshold.
   */
  abstract isLevelEnabled(level: LogLevel): boolean;
}
