import type { ServerResponse } from "http";
import { Injectable } from "@nestjs/common";
import type { Request } from "express";
import { BoundLogger, RequestContext } from "@logging/domain";
import { LoggingUseCase } from "@logging/in-ports";
import {
  InboundRequest,
  RequestContextFactory,
  REQUEST_ID_HEADER,
} from "@logging/services";
import { RequestScope } from "./scoped-request";
import { ErrorNormalizer } from "./normalizers/error.normalizer";

export type LifecycleRequest = InboundRequest &
  Pick<Request, "query"> &
  RequestScope;

export interface OpenedRequest {
  context: RequestContext;
  logger: BoundLogger;
}

/**
 * RequestLifecycle - owns the lifecycle events of one HTTP request.
 *
 * `open` binds the RequestContext and logger onto the request and emits
 * "request started". Exactly one of "request completed" or "request failed"
 * follows: whichever of `complete` / `fail` runs first wins, and the
 * response `finish` event completes requests nothing else settled
 * (unmatched routes, guard rejections).
 */
@Injectable()
export class RequestLifecycle {
  private readonly requestLogger: BoundLogger;

  constructor(
    loggingService: LoggingUseCase,
    private readonly contextFactory: RequestContextFactory,
  ) {
    this.requestLogger = loggingService.getLogger("request");
  }

  open(request: LifecycleRequest, response: ServerResponse): OpenedRequest {
    if (request.requestContext && request.logger) {
      return { context: request.requestContext, logger: request.logger };
    }

    const context = this.contextFactory.create(request);
    const logger = this.requestLogger.bind(context.toFields());

    request.requestContext = context;
    request.logger = logger;
    response.setHeader(REQUEST_ID_HEADER, context.requestId);

    logger.info("request started", { query_params: request.query });
    response.on("finish", () => this.complete(request, response));

    return { context, logger };
  }

  complete(request: LifecycleRequest, response: ServerResponse): void {
    const { requestContext, logger } = request;
    if (!requestContext || !logger || request.requestOutcome) return;

    request.requestOutcome = "completed";
    logger.info("request completed", {
      status_code: response.statusCode,
      duration_ms: requestContext.elapsedMs(),
    });
  }

  fail(request: LifecycleRequest, error: unknown): void {
    const { requestContext, logger } = request;
    if (!requestContext || !logger || request.requestOutcome) return;

    request.requestOutcome = "failed";
    const normalized = ErrorNormalizer.normalize(error);
    logger.error("request failed", {
      error_type: normalized.type,
      error: normalized.message,
      status_code: normalized.status,
      duration_ms: requestContext.elapsedMs(),
      stack: normalized.stack,
    });
  }
}
