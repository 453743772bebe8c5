import { Injectable } from "@nestjs/common";
import { BoundLogger, RequestContext } from "@logging/domain";
import { GreetingsServicePort } from "@greetings/in-ports";
import {
  GreetingResponse,
  ProtectedResourceResponse,
  UserInfoResponse,
} from "@greetings/dtos";

@Injectable()
export class GreetingsService extends GreetingsServicePort {
  greet(name: string, logger: BoundLogger): GreetingResponse {
    logger.info("hello endpoint accessed", { target_name: name });
    return { message: `Hello, ${name}!` };
  }

  /**
   * Convention only: the mock identity is advisory, so anonymous callers
   * get the resource too, just reported as such.
   */
  accessProtected(
    context: RequestContext,
    logger: BoundLogger,
  ): ProtectedResourceResponse {
    const status = context.isAnonymous ? "anonymous" : "authenticated";
    logger.info("protected endpoint accessed", { access: status });
    return { message: "This is a protected resource", status };
  }

  describeUser(context: RequestContext, logger: BoundLogger): UserInfoResponse {
    logger.info("user info requested", { requested_user: context.user });
    return {
      user: context.user ?? null,
      request_id: context.requestId,
      path: context.route,
      method: context.method,
    };
  }
}
