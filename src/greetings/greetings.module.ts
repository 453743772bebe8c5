import { Module } from "@nestjs/common";
import { GreetingsController } from "@greetings/presentation";
import { GreetingsService } from "@greetings/services";
import { GreetingsServicePort } from "@greetings/in-ports";

@Module({
  controllers: [GreetingsController],
  providers: [{ provide: GreetingsServicePort, useClass: GreetingsService }],
})
export class GreetingsModule {}
