export { GreetingsController } from "./greetings.controller";
