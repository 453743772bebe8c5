import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import { LoggingUseCase } from "@logging/in-ports";
import { ScopedRequest } from "../scoped-request";
import { ErrorNormalizer } from "../normalizers/error.normalizer";
import { RequestLifecycle } from "../request-lifecycle";

/**
 * HttpExceptionFilter - the transport boundary that turns thrown errors
 * into responses.
 *
 * HttpException: its own status, `{ detail }`.
 * Anything else: 500, `{ detail: "Internal server error", request_id }`,
 * plus an "unhandled exception occurred" event on the request logger. A
 * request no interceptor settled is marked failed first.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly loggingService: LoggingUseCase,
    private readonly lifecycle: RequestLifecycle,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const http = host.switchToHttp();
    const request = http.getRequest<ScopedRequest>();
    const response: unknown = http.getResponse();
    const normalized = ErrorNormalizer.normalize(exception);

    if (exception instanceof HttpException) {
      httpAdapter.reply(
        response,
        { detail: normalized.message },
        exception.getStatus(),
      );
      return;
    }

    this.lifecycle.fail(request, exception);

    const logger = request.logger ?? this.loggingService.getLogger("http");
    logger.error("unhandled exception occurred", {
      error: normalized.message,
      error_type: normalized.type,
      error_code: normalized.code,
      stack: normalized.stack,
    });

    httpAdapter.reply(
      response,
      {
        detail: "Internal server error",
        request_id: request.requestContext?.requestId ?? null,
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
