import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { artifactEntries, resolveTemplate, toolchainFor } from "../../src/artifacts/catalog.js";
import { ArtifactRenderer } from "../../src/artifacts/renderer.js";
import { makeSpec } from "../helpers/fixtures.js";

const context = { spec: makeSpec(), archetype: "cli-tool" as const, year: 2025 };

describe("artifactEntries", () => {
  it("adds language manifests to the common files", () => {
    expect(artifactEntries("go", "library").map((entry) => entry.path)).toEqual([
      ".gitignore",
      "README.md",
      "LICENSE",
      ".github/workflows/ci.yml",
      "go.mod",
    ]);
  });

  it("adds container and orchestration files for service meshes", () => {
    const paths = artifactEntries("python", "service-mesh").map((entry) => entry.path);

    expect(paths).toContain("Dockerfile");
    expect(paths).toContain("docker-compose.yml");
    expect(paths).toContain("infrastructure/k8s/deployment.yaml");
    expect(paths).toContain("infrastructure/terraform/main.tf");
  });

  it("marks entries as artifacts", () => {
    for (const entry of artifactEntries("rust", "game")) {
      expect(entry).toMatchObject({ role: "artifact", kind: "artifact", targetLines: 0 });
    }
  });
});

describe("toolchainFor", () => {
  it("falls back to a manifest-free toolchain for unknown languages", () => {
    expect(toolchainFor("elixir")).toMatchObject({ label: "mixed languages", manifests: [] });
  });

  it("picks the Dockerfile variant by language", () => {
    expect(resolveTemplate({ path: "Dockerfile", role: "artifact" }, "python", "enterprise-app")).toBe(
      "Dockerfile.python.tmpl",
    );
    expect(resolveTemplate({ path: "Dockerfile", role: "artifact" }, "go", "enterprise-app")).toBe(
      "Dockerfile.node.tmpl",
    );
  });
});

describe("ArtifactRenderer", () => {
  it("renders the README with repository details", async () => {
    const text = await new ArtifactRenderer().render(
      { path: "README.md", role: "artifact" },
      context,
    );

    expect(text.split("\n").slice(0, 3)).toEqual([
      "# repo-05001-build-tool",
      "",
      "build-tool implementation written in Python.",
    ]);
    expect(text).toContain("- Modular cli-tool layout");
    expect(text).toContain("pip install -r requirements.txt");
    expect(text).toContain("Roughly 4000 lines of code across the project.");
  });

  it("puts the year and name in the license", async () => {
    const text = await new ArtifactRenderer().render({ path: "LICENSE", role: "artifact" }, context);
    expect(text.split("\n")[2]).toBe("Copyright (c) 2025 repo-05001-build-tool contributors");
  });

  it("fills CI commands for the language", async () => {
    const text = await new ArtifactRenderer().render(
      { path: ".github/workflows/ci.yml", role: "artifact" },
      { ...context, spec: makeSpec({ language: "rust" }) },
    );

    expect(text).toContain("        run: cargo fetch");
    expect(text).toContain("        run: cargo test");
    expect(text).toContain("        run: cargo build --release");
  });

  it("numbers migrations from the file name", async () => {
    const text = await new ArtifactRenderer().render(
      { path: "database/migrations/migration003.sql", role: "migration" },
      { ...context, archetype: "enterprise-app" },
    );

    expect(text.split("\n")[0]).toBe("-- Migration 003: create invoices table");
    expect(text).toContain("CREATE TABLE invoices (");
  });

  it("rejects entries with no template", async () => {
    await expect(
      new ArtifactRenderer().render({ path: "notes.txt", role: "artifact" }, context),
    ).rejects.toMatchObject({ code: "ARTIFACT_UNKNOWN" });
  });

  describe("with a custom templates directory", () => {
    let templatesDir: string;

    beforeEach(async () => {
      templatesDir = await mkdtemp(join(tmpdir(), "reposynth-templates-"));
    });

    afterEach(async () => {
      await rm(templatesDir, { recursive: true, force: true });
    });

    it("reports a missing template file", async () => {
      await expect(
        new ArtifactRenderer(templatesDir).render({ path: ".gitignore", role: "artifact" }, context),
      ).rejects.toMatchObject({ code: "ARTIFACT_TEMPLATE_MISSING" });
    });

    it("rejects unknown placeholders", async () => {
      await writeFile(join(templatesDir, "gitignore.tmpl"), "{{repoName}}\n{{owner}}\n");

      await expect(
        new ArtifactRenderer(templatesDir).render({ path: ".gitignore", role: "artifact" }, context),
      ).rejects.toMatchObject({
        code: "ARTIFACT_PLACEHOLDER_UNKNOWN",
        context: { template: "gitignore.tmpl", placeholder: "owner" },
      });
    });

    it("caches templates after the first read", async () => {
      await writeFile(join(templatesDir, "gitignore.tmpl"), "{{repoName}}\n");
      const renderer = new ArtifactRenderer(templatesDir);
      const first = await renderer.render({ path: ".gitignore", role: "artifact" }, context);

      await rm(join(templatesDir, "gitignore.tmpl"));
      const second = await renderer.render({ path: ".gitignore", role: "artifact" }, context);

      expect(first).toBe("repo-05001-build-tool\n");
      expect(second).toBe(first);
    });
  });
});
