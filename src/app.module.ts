import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { APP_FILTER, APP_INTERCEPTOR } from "@nestjs/core";
import { ConfigModule } from "@nestjs/config";
import { appConfig, validateEnvironment } from "@config";
import { LoggingModule } from "@logging";
import {
  HttpExceptionFilter,
  LoggingInterceptor,
  RequestContextMiddleware,
} from "@logging/presentation";
import { GreetingsModule } from "@greetings";
import { DiagnosticsModule } from "@diagnostics";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      load: [appConfig],
      validate: validateEnvironment,
    }),
    LoggingModule,
    GreetingsModule,
    DiagnosticsModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestContextMiddleware).forRoutes("*");
  }
}
