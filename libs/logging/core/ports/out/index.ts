export { LoggerPort } from "./logger.port";
