import type { BoundLogger } from "@logging/domain";

/**
 * LoggingUseCase - Inbound port for obtaining structured loggers.
 *
 * Application code depends on this abstraction rather than on the sink,
 * so tests can swap the sink without touching handlers.
 */
export abstract class LoggingUseCase {
  /**
   * Root logger for a component. Every event it emits carries
   * `logger: name`; request-scoped handles are derived from it by `bind`.
   */
  abstract getLogger(name: string): BoundLogger;
}
