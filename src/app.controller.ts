import { Controller, Get } from "@nestjs/common";
import { BoundLogger } from "@logging/domain";
import { RequestLogger } from "@logging/presentation";
import { GreetingResponse } from "@greetings/dtos";
import { AppService, HealthResponse } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  root(@RequestLogger() logger: BoundLogger): GreetingResponse {
    return this.appService.getWelcome(logger);
  }

  @Get("health")
  health(@RequestLogger() logger: BoundLogger): HealthResponse {
    return this.appService.getHealth(logger);
  }
}
