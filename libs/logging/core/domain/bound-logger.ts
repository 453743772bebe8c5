import type { LoggerPort } from "@logging/out-ports";
import { LogLevel } from "@logging/value-objects";
import { LogFields, compactFields } from "./log-event";

/**
 * BoundLogger - a logger handle pairing a sink with an immutable field set.
 *
 * `bind` never mutates the receiver: it returns a new handle whose fields
 * are the receiver's merged with the new ones, the new values winning.
 * Binding `{a}` then `{b}` therefore yields the same fields as `{...a, ...b}`.
 * Per-call fields override bound fields for that single event.
 *
 * @example
 * const log = loggingService.getLogger("request").bind({ route: "/health" });
 * log.info("request started", { query_params: {} });
 */
export class BoundLogger {
  public readonly fields: LogFields;

  constructor(
    private readonly sink: LoggerPort,
    fields: Record<string, unknown> = {},
  ) {
    this.fields = Object.freeze(compactFields(fields));
  }

  bind(fields: Record<string, unknown>): BoundLogger {
    return new BoundLogger(this.sink, { ...this.fields, ...fields });
  }

  debug(event: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, event, fields);
  }

  info(event: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, event, fields);
  }

  warning(event: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARNING, event, fields);
  }

  error(event: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, event, fields);
  }

  log(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
    if (!this.sink.isLevelEnabled(level)) return;
    this.sink.write(level, event, compactFields({ ...this.fields, ...fields }));
  }
}
