/**
 * Shared crypto, protocol and utilities for the workshop access terminal and backend
 */

export * from "./crypto/index.js";
export * from "./protocol/index.js";
export * from "./types/index.js";
export * from "./utils/index.js";
