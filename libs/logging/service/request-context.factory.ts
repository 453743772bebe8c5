import { randomUUID } from "crypto";
import { Inject, Injectable } from "@nestjs/common";
import type { Request } from "express";
import {
  BoundLogger,
  IdentityExtractor,
  RequestContext,
} from "@logging/domain";
import { LoggingUseCase } from "@logging/in-ports";
import { LOGGING_OPTIONS, LoggingOptions } from "@logging/options";

export const REQUEST_ID_HEADER = "x-request-id";

const MAX_CORRELATION_ID_LENGTH = 128;

export type InboundRequest = Pick<
  Request,
  "method" | "originalUrl" | "url" | "headers"
>;

/**
 * RequestContextFactory - builds the RequestContext of an inbound request.
 *
 * - request id: a fresh random UUID for every request
 * - correlation id: the caller's `x-request-id`, when it sent one
 * - route: request path without query string
 * - user: mock identity from the configured headers, undefined when anonymous
 */
@Injectable()
export class RequestContextFactory {
  private readonly identityLogger: BoundLogger;

  constructor(
    @Inject(LOGGING_OPTIONS) private readonly options: LoggingOptions,
    loggingService: LoggingUseCase,
  ) {
    this.identityLogger = loggingService.getLogger("identity");
  }

  create(request: InboundRequest): RequestContext {
    const requestId = randomUUID();
    const method = request.method.toUpperCase();
    const route = this.stripQueryString(request.originalUrl || request.url);
    const user = IdentityExtractor.extract(
      request.headers,
      this.options.userHeader,
      this.identityLogger.bind({ route, method, request_id: requestId }),
    );

    return new RequestContext(
      requestId,
      method,
      route,
      this.header(request, "user-agent") ?? "unknown",
      user,
      this.correlationId(request),
    );
  }

  private correlationId(request: InboundRequest): string | undefined {
    const incoming = this.header(request, REQUEST_ID_HEADER);
    return incoming && incoming.length <= MAX_CORRELATION_ID_LENGTH
      ? incoming
      : undefined;
  }

  private header(request: InboundRequest, name: string): string | undefined {
    const value = request.headers[name];
    return Array.isArray(value) ? value[0] : value;
  }

  private stripQueryString(path: string): string {
    const queryIndex = path.indexOf("?");
    return queryIndex === -1 ? path : path.substring(0, queryIndex);
  }
}
