import type { DestinationStream } from "pino";
import { LogEvent, isLogEvent } from "@logging/domain";

/**
 * MemoryLogSink - in-memory pino destination for tests.
 * Parses every JSON line and keeps the records in emission order.
 */
export class MemoryLogSink implements DestinationStream {
  private readonly records: LogEvent[] = [];

  write(line: string): void {
    for (const chunk of line.split("\n")) {
      if (!chunk.trim()) continue;
      const parsed: unknown = JSON.parse(chunk);
      if (isLogEvent(parsed)) this.records.push(parsed);
    }
  }

  get all(): readonly LogEvent[] {
    return this.records;
  }

  events(): string[] {
    return this.records.map((record) => record.event);
  }

  byEvent(event: string): LogEvent[] {
    return this.records.filter((record) => record.event === event);
  }

  byRequest(requestId: string): LogEvent[] {
    return this.records.filter((record) => record.request_id === requestId);
  }

  clear(): void {
    this.records.length = 0;
  }
}
