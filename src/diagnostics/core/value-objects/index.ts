export {
  DiagnosticsErrorCode,
  SimulatedFailureError,
} from "./diagnostics-errors.vo";
