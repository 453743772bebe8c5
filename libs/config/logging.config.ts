import { registerAs } from "@nestjs/config";
import { LoggingOptions } from "@logging/options";
import {
  LogLevel,
  LogRenderer,
  isLogLevel,
  isLogRenderer,
} from "@logging/value-objects";
import { DEFAULT_USER_HEADER } from "@logging/domain";

/**
 * Logging Configuration
 *
 * Read once when the config module loads; the environment has already been
 * checked by `validateEnvironment`.
 */
export const loggingConfig = registerAs("logging", (): LoggingOptions => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  const renderer = process.env.LOG_RENDERER?.toLowerCase();

  return {
    level: isLogLevel(level) ? level : LogLevel.INFO,
    renderer: isLogRenderer(renderer) ? renderer : LogRenderer.JSON,
    userHeader: process.env.LOG_USER_HEADER || DEFAULT_USER_HEADER,
  };
});
