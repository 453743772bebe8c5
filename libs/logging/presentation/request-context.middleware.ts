import { Injectable, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Response } from "express";
import { ScopedRequest } from "./scoped-request";
import { RequestLifecycle } from "./request-lifecycle";

/**
 * Opens the request scope before routing, so unmatched routes and requests
 * rejected ahead of the handler are logged as well.
 *
 * @example
 * ```typescript
 * configure(consumer: MiddlewareConsumer) {
 *   consumer.apply(RequestContextMiddleware).forRoutes("*");
 * }
 * ```
 */
@Injectable()
export class RequestContextMiddleware
  implements NestMiddleware<ScopedRequest, Response>
{
  constructor(private readonly lifecycle: RequestLifecycle) {}

  use(request: ScopedRequest, response: Response, next: NextFunction): void {
    this.lifecycle.open(request, response);
    next();
  }
}
