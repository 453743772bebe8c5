export { DiagnosticsService } from "./diagnostics.service";
