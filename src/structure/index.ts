export { ARCHETYPE_RULES, classifyArchetype, hasInfrastructure } from "./archetype.js";
export { extensionFor, generateStructure, planStructure } from "./generator.js";
export type { StructureOptions } from "./generator.js";
export { LAYOUTS, SERVICE_ROTATION, serviceCountFor, serviceName } from "./layouts.js";
export type { ArchetypeLayout, CountRange, FileGroup, PinnedLanguage } from "./layouts.js";
