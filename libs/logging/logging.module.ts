import { Module, Global } from "@nestjs/common";
import { ConfigModule, ConfigType } from "@nestjs/config";
import { loggingConfig } from "@config";
import {
  LoggingService,
  RequestContextFactory,
  StructuredNestLogger,
} from "@logging/services";
import { PinoLogger } from "@logging/infrastructure";
import { LoggerPort } from "@logging/out-ports";
import { LoggingUseCase } from "@logging/in-ports";
import {
  LoggingInterceptor,
  RequestContextMiddleware,
  RequestContextPipe,
  RequestLifecycle,
  RequestLoggerPipe,
} from "@logging/presentation";
import { LOGGING_OPTIONS } from "./logging.options";

/**
 * LoggingModule - NestJS module for the logging library.
 *
 * Marked @Global() so it is imported once in AppModule. The sink is built
 * from LOGGING_OPTIONS; override that provider in tests to capture records
 * with MemoryLogSink.
 */
@Global()
@Module({
  imports: [ConfigModule.forFeature(loggingConfig)],
  providers: [
    {
      provide: LOGGING_OPTIONS,
      useFactory: (config: ConfigType<typeof loggingConfig>) => config,
      inject: [loggingConfig.KEY],
    },
    {
      provide: LoggerPort,
      useClass: PinoLogger,
    },
    LoggingService,
    { provide: LoggingUseCase, useExisting: LoggingService },
    RequestContextFactory,
    StructuredNestLogger,
    RequestLifecycle,
    RequestContextMiddleware,
    LoggingInterceptor,
    RequestLoggerPipe,
    RequestContextPipe,
  ],
  exports: [
    LOGGING_OPTIONS,
    LoggingService,
    LoggingUseCase,
    RequestContextFactory,
    StructuredNestLogger,
    RequestLifecycle,
    RequestContextMiddleware,
    LoggingInterceptor,
    RequestLoggerPipe,
    RequestContextPipe,
  ],
})
export class LoggingModule {}
