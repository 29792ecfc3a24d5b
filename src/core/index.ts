export * from "./config.js";
export * from "./errors.js";
export * from "./event-bus.js";
export * from "./random.js";
export * from "./types.js";
export * from "./utils.js";
