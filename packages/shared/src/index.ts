// Re-export all types and utilities
export * from "./types/common";
export * from "./types/document";
export * from "./types/protocol";
export * from "./types/session";
export * from "./constants";
export * from "./utils";
export * from "./services/logger";
