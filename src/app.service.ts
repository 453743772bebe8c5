import { Inject, Injectable, OnApplicationShutdown } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { appConfig } from "@config";
import { BoundLogger } from "@logging/domain";
import { LoggingUseCase } from "@logging/in-ports";
import { GreetingResponse } from "@greetings/dtos";

export interface HealthResponse {
  status: "healthy";
  service: string;
}

@Injectable()
export class AppService implements OnApplicationShutdown {
  private readonly logger: BoundLogger;

  constructor(
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
    loggingService: LoggingUseCase,
  ) {
    this.logger = loggingService.getLogger("app");
  }

  getWelcome(logger: BoundLogger): GreetingResponse {
    logger.info("root endpoint accessed");
    return { message: "Welcome to the structured logging demo" };
  }

  getHealth(logger: BoundLogger): HealthResponse {
    logger.debug("health check performed");
    return { status: "healthy", service: this.config.serviceName };
  }

  onApplicationShutdown(signal?: string): void {
    this.logger.info("application shutting down", { signal });
  }
}
