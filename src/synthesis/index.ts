export * from "./registry.js";
export * from "./synthesizer.js";
export * from "./types.js";
