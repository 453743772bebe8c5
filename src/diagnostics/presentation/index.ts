export { DiagnosticsController } from "./diagnostics.controller";
