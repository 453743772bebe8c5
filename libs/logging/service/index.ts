export { LoggingService } from "./logging.service";
export {
  RequestContextFactory,
  REQUEST_ID_HEADER,
} from "./request-context.factory";
export type { InboundRequest } from "./request-context.factory";
export { StructuredNestLogger } from "./structured-nest.logger";
