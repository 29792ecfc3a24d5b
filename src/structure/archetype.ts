import type { Archetype, RepoSpec } from "../core/index.js";

type ClassifiableSpec = Pick<RepoSpec, "category" | "template">;

interface ArchetypeRule {
  archetype: Archetype;
  matches(spec: ClassifiableSpec): boolean;
}

const includesAny = (value: string, needles: readonly string[]): boolean =>
  needles.some((needle) => value.includes(needle));

/** First match wins; order is the dispatch priority. */
export const ARCHETYPE_RULES: readonly ArchetypeRule[] = [
  {
    archetype: "web-app",
    matches: ({ category, template }) =>
      includesAny(template, ["web", "framework"]) || includesAny(category, ["web", "framework"]),
  },
  { archetype: "service-mesh", matches: ({ category }) => category.includes("microservice") },
  { archetype: "cli-tool", matches: ({ category }) => category.includes("cli") },
  {
    archetype: "library",
    matches: ({ category, template }) => category.includes("lib") || template.includes("lib"),
  },
  { archetype: "mobile-app", matches: ({ category }) => category.includes("mobile") },
  { archetype: "game", matches: ({ category }) => category.includes("game") },
  { archetype: "data-pipeline", matches: ({ category }) => category.includes("data") },
];

export function classifyArchetype(spec: ClassifiableSpec): Archetype {
  const category = spec.category.toLowerCase();
  const template = spec.template.toLowerCase();
  const rule = ARCHETYPE_RULES.find((candidate) => candidate.matches({ category, template }));
  return rule?.archetype ?? "enterprise-app";
}

/** Archetypes that ship container and orchestration descriptors. */
export function hasInfrastructure(archetype: Archetype): boolean {
  return archetype === "service-mesh" || archetype === "enterprise-app";
}
