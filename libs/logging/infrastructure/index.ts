export { PinoLogger } from "./pino/pino.logger";
export { MemoryLogSink } from "./memory/memory.sink";
