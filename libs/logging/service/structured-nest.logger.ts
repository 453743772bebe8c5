import { Injectable, LoggerService } from "@nestjs/common";
import { BoundLogger, isRecord } from "@logging/domain";
import { LoggingUseCase } from "@logging/in-ports";
import { LogLevel } from "@logging/value-objects";

const FRAMEWORK_LOGGER = "nest";

/**
 * StructuredNestLogger - routes NestJS framework messages (bootstrap, route
 * mapping, shutdown) through the structured sink.
 *
 * Nest calls `log(message, context)` and `error(message, stack, context)`;
 * the trailing string is the context and becomes the `logger` field.
 */
@Injectable()
export class StructuredNestLogger implements LoggerService {
  private readonly loggers = new Map<string, BoundLogger>();

  constructor(private readonly loggingService: LoggingUseCase) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(LogLevel.INFO, message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(LogLevel.ERROR, message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(LogLevel.WARNING, message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(LogLevel.DEBUG, message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(LogLevel.DEBUG, message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(LogLevel.ERROR, message, optionalParams);
  }

  private emit(level: LogLevel, message: unknown, params: unknown[]): void {
    const last = params[params.length - 1];
    const context =
      typeof last === "string" && params.length > 0 ? last : FRAMEWORK_LOGGER;
    const rest = typeof last === "string" ? params.slice(0, -1) : params;

    const fields: Record<string, unknown> = {};
    if (level === LogLevel.ERROR && typeof rest[0] === "string") {
      fields.stack = rest[0];
    }

    if (isRecord(message)) {
      const { message: text, ...extra } = message;
      this.logger(context).log(
        level,
        typeof text === "string" ? text : "message",
        { ...extra, ...fields },
      );
      return;
    }

    this.logger(context).log(level, String(message), fields);
  }

  private logger(context: string): BoundLogger {
    let logger = this.loggers.get(context);
    if (!logger) {
      logger = this.loggingService.getLogger(context);
      this.loggers.set(context, logger);
    }
    return logger;
  }
}
