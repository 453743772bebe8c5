import {
  createParamDecorator,
  ExecutionContext,
  Injectable,
  PipeTransform,
} from "@nestjs/common";
import { BoundLogger, RequestContext } from "@logging/domain";
import { LoggingUseCase } from "@logging/in-ports";
import { RequestContextFactory } from "@logging/services";
import { ScopedRequest } from "./scoped-request";

const ScopedRequestParam = createParamDecorator(
  (_data: unknown, context: ExecutionContext): ScopedRequest =>
    context.switchToHttp().getRequest<ScopedRequest>(),
);

/**
 * Resolves the logger bound by RequestLifecycle. Without the context layer
 * it falls back to the `request` logger bound with route and method only.
 */
@Injectable()
export class RequestLoggerPipe
  implements PipeTransform<ScopedRequest, BoundLogger>
{
  constructor(private readonly loggingService: LoggingUseCase) {}

  transform(request: ScopedRequest): BoundLogger {
    return (
      request.logger ??
      this.loggingService
        .getLogger("request")
        .bind({ route: request.path, method: request.method })
    );
  }
}

@Injectable()
export class RequestContextPipe
  implements PipeTransform<ScopedRequest, RequestContext>
{
  constructor(private readonly contextFactory: RequestContextFactory) {}

  transform(request: ScopedRequest): RequestContext {
    return request.requestContext ?? this.contextFactory.create(request);
  }
}

/**
 * Injects the request-scoped BoundLogger into a handler.
 *
 * @example
 * ```typescript
 * @Get("hello/:name")
 * hello(@Param("name") name: string, @RequestLogger() logger: BoundLogger) {
 *   logger.info("hello endpoint accessed", { target_name: name });
 * }
 * ```
 */
export const RequestLogger = (): ParameterDecorator =>
  ScopedRequestParam(RequestLoggerPipe);

/**
 * Injects the RequestContext (user, route, method, request id) of the
 * current request.
 */
export const CurrentRequestContext = (): ParameterDecorator =>
  ScopedRequestParam(RequestContextPipe);
