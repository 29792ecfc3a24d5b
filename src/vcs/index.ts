export * from "./git-backend.js";
export * from "./git-env.js";
