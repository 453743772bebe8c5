/**
 * Public API exports for the logging library.
 * This allows clean imports: import { LoggingModule, LoggingService } from '@logging'
 */

// Module
export { LoggingModule } from "./logging.module";
export { LOGGING_OPTIONS } from "./logging.options";
export type { LoggingOptions } from "./logging.options";

// Domain
export { BoundLogger, RequestContext, IdentityExtractor } from "./core/domain";
export { LogLevel, LogRenderer } from "./core/value-objects";

// Services
export {
  LoggingService,
  RequestContextFactory,
  StructuredNestLogger,
} from "./service";

// Presentation
export {
  LoggingInterceptor,
  RequestContextMiddleware,
  RequestLifecycle,
  HttpExceptionFilter,
  RequestLogger,
  CurrentRequestContext,
} from "./presentation";

// Infrastructure
export { MemoryLogSink } from "./infrastructure";
