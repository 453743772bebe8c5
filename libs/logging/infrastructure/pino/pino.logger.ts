import { Inject, Injectable } from "@nestjs/common";
import pino from "pino";
import type { DestinationStream, Level, Logger, LoggerOptions } from "pino";
import pretty from "pino-pretty";
import { LoggerPort } from "@logging/out-ports";
import { LogLevel, LogRenderer } from "@logging/value-objects";
import { LOGGING_OPTIONS, LoggingOptions } from "@logging/options";

const PINO_LEVELS: Record<LogLevel, Level> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARNING]: "warn",
  [LogLevel.ERROR]: "error",
};

/**
 * PinoLogger - Infrastructure implementation of LoggerPort backed by pino.
 *
 * JSON renderer emits one object per line:
 * `{"level":"info","timestamp":"<ISO-8601>",...fields,"event":"..."}`.
 * Console renderer pipes the same records through pino-pretty in-process
 * (no worker transport).
 */
@Injectable()
export class PinoLogger extends LoggerPort {
  private readonly pino: Logger;

  constructor(@Inject(LOGGING_OPTIONS) options: LoggingOptions) {
    super();
    this.pino = pino(
      PinoLogger.buildOptions(options),
      PinoLogger.buildDestination(options),
    );
  }

  override isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(PINO_LEVELS[level]);
  }

  override write(
    level: LogLevel,
    event: string,
    fields: Readonly<Record<string, unknown>>,
  ): void {
    this.pino[PINO_LEVELS[level]]({ ...fields }, event);
  }

  private static buildOptions(options: LoggingOptions): LoggerOptions {
    return {
      level: PINO_LEVELS[options.level],
      // no pid/hostname
      base: null,
      messageKey: "event",
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters:
        options.renderer === LogRenderer.JSON
          ? {
              level: (label) => ({
                level: label === "warn" ? LogLevel.WARNING : label,
              }),
            }
          : {},
    };
  }

  private static buildDestination(options: LoggingOptions): DestinationStream {
    if (options.renderer === LogRenderer.CONSOLE) {
      return pretty({
        destination: options.destination ?? 1,
        sync: true,
        colorize: options.destination === undefined && process.stdout.isTTY,
        messageKey: "event",
        timestampKey: "timestamp",
        translateTime: false,
        singleLine: true,
      });
    }

    return options.destination ?? pino.destination({ dest: 1, sync: true });
  }
}
