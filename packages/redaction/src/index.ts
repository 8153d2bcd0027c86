export * from "./types.js";
export * from "./detectors.js";
export * from "./redact.js";
