export { LoggingUseCase } from "./logging.use-case";
