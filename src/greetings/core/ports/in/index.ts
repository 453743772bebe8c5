export { GreetingsServicePort } from "./greetings.service.port";
