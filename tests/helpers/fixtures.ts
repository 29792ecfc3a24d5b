import type { Contributor, LanguageDefinition, RepoSpec } from "../../src/core/types.js";

export const TEST_CONTRIBUTORS: Contributor[] = [
  { name: "Dev One", email: "dev1@example.com" },
  { name: "Dev Two", email: "dev2@example.com" },
];

export const TEST_LANGUAGES: LanguageDefinition[] = [
  { name: "python", weight: 0.5, extensions: [".py"] },
  { name: "go", weight: 0.3, extensions: [".go"] },
  { name: "ruby", weight: 0.2, extensions: [".rb"] },
];

export function makeSpec(overrides: Partial<RepoSpec> = {}): RepoSpec {
  return {
    id: 5001,
    name: "repo-05001-build-tool",
    category: "cli_tools",
    template: "build-tool",
    language: "python",
    targetLines: 4000,
    targetCommits: 120,
    contributorCount: TEST_CONTRIBUTORS.length,
    contributors: TEST_CONTRIBUTORS,
    ...overrides,
  };
}
