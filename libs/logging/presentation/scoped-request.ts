import type { Request } from "express";
import type { BoundLogger, RequestContext } from "@logging/domain";

/**
 * Express request as seen after RequestContextMiddleware ran.
 * Every slot belongs to this request alone and dies with it.
 */
export interface RequestScope {
  requestContext?: RequestContext;
  logger?: BoundLogger;
  /** Set once "request completed" or "request failed" has been emitted. */
  requestOutcome?: "completed" | "failed";
}

export type ScopedRequest = Request & RequestScope;
