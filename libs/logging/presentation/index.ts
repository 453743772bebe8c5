export { LoggingInterceptor } from "./logging.interceptor";
export { RequestContextMiddleware } from "./request-context.middleware";
export { RequestLifecycle } from "./request-lifecycle";
export type { LifecycleRequest, OpenedRequest } from "./request-lifecycle";
export { HttpExceptionFilter } from "./filters/http-exception.filter";
export {
  RequestLogger,
  CurrentRequestContext,
  RequestLoggerPipe,
  RequestContextPipe,
} from "./request-scope.decorators";
export { ErrorNormalizer } from "./normalizers/error.normalizer";
export type { NormalizedError } from "./normalizers/error.normalizer";
export type { ScopedRequest, RequestScope } from "./scoped-request";
