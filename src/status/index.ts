export * from "./reader.js";
