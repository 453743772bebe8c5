import { Injectable } from "@nestjs/common";
import { LoggerPort } from "@logging/out-ports";
import { LoggingUseCase } from "@logging/in-ports";
import { BoundLogger } from "@logging/domain";

/**
 * LoggingService - Application layer entry point for structured logging.
 *
 * Hands out root BoundLoggers over the configured sink. Request handles are
 * derived from these by RequestLifecycle; handlers never build their own.
 */
@Injectable()
export class LoggingService extends LoggingUseCase {
  constructor(private readonly sink: LoggerPort) {
    super();
  }

  override getLogger(name: string): BoundLogger {
    return new BoundLogger(this.sink, { logger: name });
  }
}
