export * from "./schema";
export * from "./request";
export * from "./errors";
export * from "./logger";
