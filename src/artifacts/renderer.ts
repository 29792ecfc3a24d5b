import { readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { fileURLToPath } from "node:url";

import {
  type Archetype,
  type FileManifestEntry,
  type RepoSpec,
  artifactError,
} from "../core/index.js";
import { resolveTemplate, toolchainFor } from "./catalog.js";

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

const PLACEHOLDER_PATTERN = /\{\{([A-Za-z][A-Za-z0-9]*)\}\}/g;

const MIGRATION_TABLES = [
  "users",
  "accounts",
  "orders",
  "invoices",
  "products",
  "sessions",
  "audit_logs",
  "settings",
  "notifications",
  "payments",
] as const;

export interface ArtifactContext {
  spec: RepoSpec;
  archetype: Archetype;
  /** Copyright year, taken from the bootstrap commit. */
  year: number;
}

/**
 * Renders boilerplate files from the `templates/` directory. Templates use
 * `{{name}}` placeholders; an unknown placeholder is an error.
 */
export class ArtifactRenderer {
  private readonly templatesDir: string;
  private readonly cache = new Map<string, string>();

  public constructor(templatesDir: string = DEFAULT_TEMPLATES_DIR) {
    this.templatesDir = templatesDir;
  }

  public async render(
    entry: Pick<FileManifestEntry, "path" | "role">,
    context: ArtifactContext,
  ): Promise<string> {
    const templateName = resolveTemplate(entry, context.spec.language, context.archetype);
    if (!templateName) {
      throw artifactError("ARTIFACT_UNKNOWN", `No template is registered for ${entry.path}`, {
        context: { path: entry.path, role: entry.role },
      });
    }

    const source = await this.load(templateName);
    const values = buildValues(entry, context);

    return source.replace(PLACEHOLDER_PATTERN, (_, key: string) => {
      const value = values[key];
      if (value === undefined) {
        throw artifactError(
          "ARTIFACT_PLACEHOLDER_UNKNOWN",
          `Template ${templateName} references unknown placeholder {{${key}}}`,
          { context: { template: templateName, placeholder: key } },
        );
      }
      return value;
    });
  }

  private async load(templateName: string): Promise<string> {
    const cached = this.cache.get(templateName);
    if (cached !== undefined) {
      return cached;
    }

    try {
      const source = await readFile(join(this.templatesDir, templateName), "utf8");
      this.cache.set(templateName, source);
      return source;
    } catch (error) {
      throw artifactError("ARTIFACT_TEMPLATE_MISSING", `Cannot read template ${templateName}`, {
        context: { templatesDir: this.templatesDir },
        cause: error,
      });
    }
  }
}

function buildValues(
  entry: Pick<FileManifestEntry, "path" | "role">,
  context: ArtifactContext,
): Record<string, string> {
  const { spec, archetype, year } = context;
  const toolchain = toolchainFor(spec.language);
  const migrationNumber = Number.parseInt(basename(entry.path).replace(/\D/g, ""), 10);
  const migrationIndex = Number.isFinite(migrationNumber) ? migrationNumber : 0;

  return {
    repoName: spec.name,
    template: spec.template,
    archetype,
    languageLabel: toolchain.label,
    installCommand: toolchain.installCommand,
    testCommand: toolchain.testCommand,
    buildCommand: toolchain.buildCommand,
    targetLines: String(spec.targetLines),
    year: String(year),
    databaseName: spec.name.replace(/-/g, "_"),
    migrationId: String(migrationIndex).padStart(3, "0"),
    table: MIGRATION_TABLES[migrationIndex % MIGRATION_TABLES.length],
  };
}
