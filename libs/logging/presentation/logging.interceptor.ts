import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from "@nestjs/common";
import { Observable, throwError } from "rxjs";
import { catchError, tap } from "rxjs/operators";
import type { Response } from "express";
import { ScopedRequest } from "./scoped-request";
import { RequestLifecycle } from "./request-lifecycle";

/**
 * LoggingInterceptor - observes the handler of every matched HTTP route.
 *
 * The scope is normally opened by RequestContextMiddleware; the interceptor
 * opens it itself when the middleware is not installed. It then settles the
 * request:
 * - handler emitted: "request completed" { status_code, duration_ms }
 * - handler threw: "request failed" { error_type, error, status_code,
 *   duration_ms, stack }, then the very same error is re-thrown
 *
 * Failures are observed, never converted: the exception filter owns the
 * HTTP response.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(private readonly lifecycle: RequestLifecycle) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== "http") {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<ScopedRequest>();
    const response = http.getResponse<Response>();

    this.lifecycle.open(request, response);

    return next.handle().pipe(
      tap(() => this.lifecycle.complete(request, response)),
      catchError((error: unknown) => {
        this.lifecycle.fail(request, error);
        return throwError(() => error);
      }),
    );
  }
}
