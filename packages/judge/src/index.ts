export * from "./config.js";
export * from "./logger.js";
export * from "./settings.js";
export * from "./record.js";
export * from "./hook.js";
export * from "./cli.js";
export * from "./oracles/index.js";
