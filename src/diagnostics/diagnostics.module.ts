import { Module } from "@nestjs/common";
import { DiagnosticsController } from "@diagnostics/presentation";
import { DiagnosticsService } from "@diagnostics/services";
import { DiagnosticsServicePort } from "@diagnostics/in-ports";

@Module({
  controllers: [DiagnosticsController],
  providers: [
    { provide: DiagnosticsServicePort, useClass: DiagnosticsService },
  ],
})
export class DiagnosticsModule {}
