export * from "./constants.js";
export * from "./errors.js";
export * from "./schema.js";
export * from "./types.js";
export * from "./response-parser.js";
export * from "./prompt.js";
export * from "./orchestrator.js";
export * from "./synthesizer.js";
export * from "./stable-json.js";
