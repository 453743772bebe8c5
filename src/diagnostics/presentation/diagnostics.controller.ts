import { Controller, Post } from "@nestjs/common";
import { BoundLogger } from "@logging/domain";
import { RequestLogger } from "@logging/presentation";
import { DiagnosticsServicePort } from "@diagnostics/in-ports";

@Controller()
export class DiagnosticsController {
  constructor(private readonly diagnosticsService: DiagnosticsServicePort) {}

  @Post("simulate-error")
  simulateError(@RequestLogger() logger: BoundLogger): never {
    return this.diagnosticsService.simulateFailure(logger);
  }
}
