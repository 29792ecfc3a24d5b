export * from "./artifacts/index.js";
export * from "./core/index.js";
export * from "./generation/index.js";
export * from "./scheduling/index.js";
export * from "./selection/index.js";
export * from "./status/index.js";
export * from "./structure/index.js";
export * from "./synthesis/index.js";
export * from "./vcs/index.js";
