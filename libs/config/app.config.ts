import { registerAs } from "@nestjs/config";

export const DEFAULT_SERVICE_NAME = "structured-logging-demo";

export const appConfig = registerAs("app", () => ({
  host: process.env.HOST || "127.0.0.1",
  port: Number(process.env.PORT || 3000),
  serviceName: process.env.SERVICE_NAME || DEFAULT_SERVICE_NAME,
  version: process.env.npm_package_version ?? "1.0.0",
}));
