import { Injectable } from "@nestjs/common";
import { BoundLogger } from "@logging/domain";
import { DiagnosticsServicePort } from "@diagnostics/in-ports";
import { SimulatedFailureError } from "@diagnostics/value-objects";

@Injectable()
export class DiagnosticsService extends DiagnosticsServicePort {
  simulateFailure(logger: BoundLogger): never {
    logger.warning("error simulation requested");
    logger.info("processing simulation");

    const failure = new SimulatedFailureError();
    logger.error("simulated error occurred", {
      error_details: failure.message,
    });

    throw failure;
  }
}
