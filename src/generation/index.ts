export * from "./orchestrator.js";
export * from "./repo-generator.js";
export * from "./planner.js";
