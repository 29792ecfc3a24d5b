import { mkdir } from "node:fs/promises";
import { join, posix } from "node:path";

import { artifactEntries } from "../artifacts/catalog.js";
import {
  type FileManifestEntry,
  type LanguageDefinition,
  type RepoSpec,
  type Rng,
  type StructureResult,
  structureError,
} from "../core/index.js";
import { classifyArchetype } from "./archetype.js";
import { type CountRange, type FileGroup, LAYOUTS } from "./layouts.js";

export interface StructureOptions {
  languages: readonly LanguageDefinition[];
}

const FALLBACK_EXTENSION = ".txt";

function draw(range: CountRange, rng: Rng): number {
  return typeof range === "number" ? range : rng.int(range[0], range[1]);
}

export function extensionFor(
  language: string,
  languages: readonly LanguageDefinition[],
): string {
  return languages.find((candidate) => candidate.name === language)?.extensions[0] ??
    FALLBACK_EXTENSION;
}

function expandGroup(
  group: FileGroup,
  spec: RepoSpec,
  rng: Rng,
  options: StructureOptions,
): FileManifestEntry[] {
  const language = group.language?.name ?? spec.language;
  const extension = group.language?.extension ?? extensionFor(spec.language, options.languages);
  const count = draw(group.count, rng);
  const entries: FileManifestEntry[] = [];

  for (let index = 0; index < count; index += 1) {
    const stem = typeof group.stem === "string" ? group.stem : group.stem(index);
    entries.push({
      path: posix.join(group.dir, `${stem}${extension}`),
      role: group.role,
      targetLines: draw(group.lines, rng),
      language,
      kind: group.kind ?? "source",
    });
  }

  return entries;
}

/**
 * Decide the directory skeleton and file manifest for a spec. Pure apart from
 * the random draws; nothing touches the filesystem.
 */
export function planStructure(
  spec: RepoSpec,
  rng: Rng,
  options: StructureOptions,
): StructureResult {
  const archetype = classifyArchetype(spec);
  const layout = LAYOUTS[archetype](spec);

  const manifest = [
    ...layout.groups.flatMap((group) => expandGroup(group, spec, rng, options)),
    ...artifactEntries(spec.language, archetype),
  ];

  const seen = new Set<string>();
  for (const entry of manifest) {
    if (seen.has(entry.path)) {
      throw structureError("STRUCTURE_PATH_CONFLICT", `Duplicate manifest path ${entry.path}`, {
        context: { repo: spec.name, path: entry.path },
      });
    }
    seen.add(entry.path);
  }

  const directories = new Set(layout.directories);
  for (const entry of manifest) {
    const dir = posix.dirname(entry.path);
    if (dir !== ".") directories.add(dir);
  }

  return {
    archetype,
    directories: [...directories].sort(),
    manifest,
  };
}

/** Plan the structure, then create every directory under `repoPath`. */
export async function generateStructure(
  spec: RepoSpec,
  rng: Rng,
  repoPath: string,
  options: StructureOptions,
): Promise<StructureResult> {
  const structure = planStructure(spec, rng, options);

  for (const dir of ["", ...structure.directories]) {
    const target = join(repoPath, dir);
    try {
      await mkdir(target, { recursive: true });
    } catch (error) {
      throw structureError("STRUCTURE_MKDIR_FAILED", `Cannot create directory ${target}`, {
        context: { repo: spec.name, path: target },
        cause: error,
      });
    }
  }

  return structure;
}
