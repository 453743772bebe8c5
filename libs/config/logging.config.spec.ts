import { LogLevel, LogRenderer } from "@logging/value-objects";
import { loggingConfig } from "./logging.config";

describe("loggingConfig", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("should default to info, json and x-user-name", () => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_RENDERER;
    delete process.env.LOG_USER_HEADER;

    expect(loggingConfig()).toEqual({
      level: LogLevel.INFO,
      renderer: LogRenderer.JSON,
      userHeader: "x-user-name",
    });
  });

  it("should read level, renderer and header from the environment", () => {
    process.env.LOG_LEVEL = "WARNING";
    process.env.LOG_RENDERER = "console";
    process.env.LOG_USER_HEADER = "x-demo-user";

    expect(loggingConfig()).toEqual({
      level: LogLevel.WARNING,
      renderer: LogRenderer.CONSOLE,
      userHeader: "x-demo-user",
    });
  });
});
