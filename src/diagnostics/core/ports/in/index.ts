export { DiagnosticsServicePort } from "./diagnostics.service.port";
