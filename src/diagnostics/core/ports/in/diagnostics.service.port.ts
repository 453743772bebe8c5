import { BoundLogger } from "@logging/domain";

export abstract class DiagnosticsServicePort {
  /**
   * Logs the simulation steps, then throws. Never returns.
   */
  abstract simulateFailure(logger: BoundLogger): never;
}
