export * from "./compose";
export * from "./config";
export * from "./demo";
export * from "./dependencies";
export * from "./errors";
export * from "./liveness";
export * from "./logger";
export * from "./readiness";
export * from "./uri";
