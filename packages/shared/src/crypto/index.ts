export * from "./aes.js";
export * from "./cmac.js";
export * from "./diversification.js";
export * from "./mutual-auth.js";
export * from "./session-keys.js";
export * from "./sdm.js";
