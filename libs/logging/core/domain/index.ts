export * from "./log-event";
export * from "./bound-logger";
export * from "./request-context";
export * from "./identity.extractor";
