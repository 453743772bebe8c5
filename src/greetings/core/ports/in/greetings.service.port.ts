import { BoundLogger, RequestContext } from "@logging/domain";
import {
  GreetingResponse,
  ProtectedResourceResponse,
  UserInfoResponse,
} from "@greetings/dtos";

/**
 * Every operation takes the request logger explicitly; nothing is looked up
 * from ambient state.
 */
export abstract class GreetingsServicePort {
  abstract greet(name: string, logger: BoundLogger): GreetingResponse;

  abstract accessProtected(
    context: RequestContext,
    logger: BoundLogger,
  ): ProtectedResourceResponse;

  abstract describeUser(
    context: RequestContext,
    logger: BoundLogger,
  ): UserInfoResponse;
}
