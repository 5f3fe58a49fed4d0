export * from "./encoding.js";
export * from "./hex.js";
export * from "./logger.js";
