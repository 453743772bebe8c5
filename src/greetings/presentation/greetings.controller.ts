import { Controller, Get, Param } from "@nestjs/common";
import { BoundLogger, RequestContext } from "@logging/domain";
import { CurrentRequestContext, RequestLogger } from "@logging/presentation";
import { GreetingsServicePort } from "@greetings/in-ports";
import {
  GreetingResponse,
  ProtectedResourceResponse,
  UserInfoResponse,
} from "@greetings/dtos";

@Controller()
export class GreetingsController {
  constructor(private readonly greetingsService: GreetingsServicePort) {}

  @Get("hello/:name")
  hello(
    @Param("name") name: string,
    @RequestLogger() logger: BoundLogger,
  ): GreetingResponse {
    return this.greetingsService.greet(name, logger);
  }

  @Get("protected")
  protectedResource(
    @CurrentRequestContext() context: RequestContext,
    @RequestLogger() logger: BoundLogger,
  ): ProtectedResourceResponse {
    return this.greetingsService.accessProtected(context, logger);
  }

  @Get("user-info")
  userInfo(
    @CurrentRequestContext() context: RequestContext,
    @RequestLogger() logger: BoundLogger,
  ): UserInfoResponse {
    return this.greetingsService.describeUser(context, logger);
  }
}
