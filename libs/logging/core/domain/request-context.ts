import { LogFields } from "./log-event";

/**
 * RequestContext - the metadata bound to every event of one inbound request.
 *
 * Created once per request by RequestLifecycle and attached to that request
 * only. `user` is undefined for anonymous requests; it is never replaced by
 * a placeholder string. `requestId` is always generated here; an id sent by
 * the caller is kept apart as `correlationId`.
 */
export class RequestContext {
  public readonly startedAt: number;

  constructor(
    public readonly requestId: string,
    public readonly method: string,
    public readonly route: string,
    public readonly userAgent: string,
    public readonly user?: string,
    public readonly correlationId?: string,
  ) {
    this.startedAt = Date.now();
  }

  get isAnonymous(): boolean {
    return this.user === undefined;
  }

  elapsedMs(now: number = Date.now()): number {
    return now - this.startedAt;
  }

  /**
   * Field set bound onto the request logger.
   */
  toFields(): LogFields {
    return {
      ...(this.user !== undefined ? { user: this.user } : {}),
      route: this.route,
      method: this.method,
      request_id: this.requestId,
      user_agent: this.userAgent,
      ...(this.correlationId !== undefined
        ? { correlation_id: this.correlationId }
        : {}),
    };
  }
}
