export enum DiagnosticsErrorCode {
  SIMULATED_FAILURE = "SIMULATED_FAILURE",
}

/**
 * Raised on purpose by the error simulation endpoint. Deliberately not an
 * HttpException so that it reaches the transport as an unhandled failure.
 */
export class SimulatedFailureError extends Error {
  public readonly code = DiagnosticsErrorCode.SIMULATED_FAILURE;

  constructor(message = "This is a simulated error for testing logging") {
    super(message);
    this.name = "SimulatedFailureError";
  }
}
