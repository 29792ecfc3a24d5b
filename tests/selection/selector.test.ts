import { describe, expect, it } from "vitest";

import { loadConfig } from "../../src/core/config.js";
import { createRng } from "../../src/core/random.js";
import type { CategoryDefinition, Contributor } from "../../src/core/types.js";
import { ContributorPool } from "../../src/selection/contributors.js";
import { SpecSelector, iterateQuotaSlots, pickLanguage } from "../../src/selection/selector.js";

const CONTRIBUTORS: Contributor[] = [
  { name: "Dev One", email: "dev1@example.com" },
  { name: "Dev Two", email: "dev2@example.com" },
  { name: "Dev Three", email: "dev3@example.com" },
];

describe("iterateQuotaSlots", () => {
  it("walks categories in order and rotates templates", () => {
    const categories: CategoryDefinition[] = [
      { name: "cli_tools", count: 3, templates: ["build-tool", "deploy-tool"] },
      { name: "games", count: 1, templates: ["unity-game"] },
      { name: "empty", count: 0, templates: ["never"] },
    ];

    expect([...iterateQuotaSlots(categories)]).toEqual([
      { category: "cli_tools", template: "build-tool", ordinal: 0 },
      { category: "cli_tools", template: "deploy-tool", ordinal: 1 },
      { category: "cli_tools", template: "build-tool", ordinal: 2 },
      { category: "games", template: "unity-game", ordinal: 0 },
    ]);
  });
});

describe("pickLanguage", () => {
  it("follows the configured weights", () => {
    const { languages } = loadConfig({});
    const rng = createRng("language-distribution");
    const counts = new Map<string, number>();
    const draws = 10_000;

    for (let i = 0; i < draws; i += 1) {
      const language = pickLanguage(languages, rng);
      counts.set(language, (counts.get(language) ?? 0) + 1);
    }

    for (const language of languages) {
      const share = (counts.get(language.name) ?? 0) / draws;
      expect(Math.abs(share - language.weight)).toBeLessThanOrEqual(0.02);
    }
  });
});

describe("SpecSelector", () => {
  const selector = new SpecSelector({
    categories: [{ name: "cli_tools", count: 2, templates: ["build-tool"] }],
    languages: [{ name: "go", weight: 1, extensions: [".go"] }],
    pool: new ContributorPool(CONTRIBUTORS),
    ranges: { lines: [1000, 2000], commits: [10, 20], maxContributors: 2 },
  });
  const slot = { category: "cli_tools", template: "build-tool", ordinal: 0 };

  it("draws a spec inside the configured ranges", () => {
    const spec = selector.select(slot, 5001, createRng("spec"));

    expect(spec.id).toBe(5001);
    expect(spec.name).toBe("repo-05001-build-tool");
    expect(spec.category).toBe("cli_tools");
    expect(spec.template).toBe("build-tool");
    expect(spec.language).toBe("go");
    expect(spec.targetLines).toBeGreaterThanOrEqual(1000);
    expect(spec.targetLines).toBeLessThanOrEqual(2000);
    expect(spec.targetCommits).toBeGreaterThanOrEqual(10);
    expect(spec.targetCommits).toBeLessThanOrEqual(20);
    expect(spec.contributorCount).toBe(spec.contributors.length);
    expect(spec.contributorCount).toBeGreaterThanOrEqual(1);
    expect(spec.contributorCount).toBeLessThanOrEqual(2);
  });

  it("returns a frozen spec", () => {
    expect(Object.isFrozen(selector.select(slot, 7, createRng("frozen")))).toBe(true);
  });

  it("pads short ids to five digits", () => {
    expect(selector.select(slot, 7, createRng("pad")).name).toBe("repo-00007-build-tool");
  });

  it("is reproducible for the same seed", () => {
    expect(selector.select(slot, 5001, createRng("same"))).toEqual(
      selector.select(slot, 5001, createRng("same")),
    );
  });

  it("reports the quota total", () => {
    expect(selector.quotaTotal()).toBe(2);
    expect([...selector.slots()]).toHaveLength(2);
  });
});

describe("ContributorPool", () => {
  it("rejects an empty pool", () => {
    expect(() => new ContributorPool([])).toThrow(RangeError);
  });

  it("draws distinct contributors within the cap", () => {
    const pool = new ContributorPool(CONTRIBUTORS);
    const rng = createRng("pool");

    for (let i = 0; i < 50; i += 1) {
      const drawn = pool.draw(rng, 5);
      expect(drawn.length).toBeGreaterThanOrEqual(1);
      expect(drawn.length).toBeLessThanOrEqual(3);
      expect(new Set(drawn.map((contributor) => contributor.email)).size).toBe(drawn.length);
    }
  });

  it("always draws at least one contributor", () => {
    const pool = new ContributorPool(CONTRIBUTORS);
    expect(pool.draw(createRng("zero"), 0)).toHaveLength(1);
  });
});
