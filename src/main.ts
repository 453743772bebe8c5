import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { ConfigType } from "@nestjs/config";
import { appConfig } from "@config";
import { LoggingUseCase } from "@logging/in-ports";
import { StructuredNestLogger } from "@logging/services";
import { AppModule } from "./app.module";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(StructuredNestLogger));
  app.enableShutdownHooks();

  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);
  const logger = app.get(LoggingUseCase).getLogger("main");

  logger.info("application starting up", { version: config.version });
  await app.listen(config.port, config.host);
  logger.info("listening", { host: config.host, port: config.port });
}

bootstrap().catch((error: unknown) => {
  const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
  process.stderr.write(`bootstrap failed: ${detail}\n`);
  process.exitCode = 1;
});
