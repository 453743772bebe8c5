import { Test, TestingModule } from "@nestjs/testing";
import { BoundLogger } from "@logging/domain";
import { LoggingService } from "@logging/services";
import { MemoryLogSink, PinoLogger } from "@logging/infrastructure";
import { LogLevel, LogRenderer } from "@logging/value-objects";
import {
  DiagnosticsErrorCode,
  SimulatedFailureError,
} from "@diagnostics/value-objects";
import { DiagnosticsService } from "./diagnostics.service";

describe("DiagnosticsService", () => {
  let service: DiagnosticsService;
  let sink: MemoryLogSink;
  let logger: BoundLogger;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [DiagnosticsService],
    }).compile();

    service = module.get<DiagnosticsService>(DiagnosticsService);

    sink = new MemoryLogSink();
    const port = new PinoLogger({
      level: LogLevel.DEBUG,
      renderer: LogRenderer.JSON,
      userHeader: "x-user-name",
      destination: sink,
    });
    logger = new LoggingService(port).getLogger("request");
  });

  it("should throw a SimulatedFailureError", () => {
    expect(() => service.simulateFailure(logger)).toThrow(SimulatedFailureError);
  });

  it("should carry a stable code", () => {
    try {
      service.simulateFailure(logger);
    } catch (error) {
      expect(error).toBeInstanceOf(SimulatedFailureError);
      expect(error).toHaveProperty("code", DiagnosticsErrorCode.SIMULATED_FAILURE);
    }
    expect.assertions(2);
  });

  it("should log the simulation steps before throwing", () => {
    expect(() => service.simulateFailure(logger)).toThrow();

    expect(sink.all.map(({ event, level }) => [event, level])).toEqual([
      ["error simulation requested", "warning"],
      ["processing simulation", "info"],
      ["simulated error occurred", "error"],
    ]);
    expect(sink.all[2].error_details).toBe(
      "This is a simulated error for testing logging",
    );
  });
});
