export { appConfig, DEFAULT_SERVICE_NAME } from "./app.config";
export { loggingConfig } from "./logging.config";
export { validateEnvironment, EnvironmentVariables } from "./env.validation";
