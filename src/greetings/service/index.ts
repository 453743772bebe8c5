export { GreetingsService } from "./greetings.service";
