import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { ArtifactRenderer } from "../artifacts/renderer.js";
import { BOOTSTRAP_FILES } from "../artifacts/catalog.js";
import {
  type FileManifestEntry,
  type GeneratedRepository,
  type LanguageDefinition,
  type RepoSpec,
  type Rng,
  type StructureResult,
  contentError,
  normalizeError,
} from "../core/index.js";
import { type TimelineOptions, bootstrapTimestamp, scheduleCommits } from "../scheduling/index.js";
import { generateStructure } from "../structure/index.js";
import { synthesizeCode } from "../synthesis/index.js";
import { type VcsBackend, replayHistory } from "../vcs/index.js";

export interface RepoGeneratorOptions {
  languages: readonly LanguageDefinition[];
  timeline: TimelineOptions;
  faultInjection: { enabled: boolean; probability: number };
  backend: VcsBackend;
  renderer: ArtifactRenderer;
  now: Date;
}

async function writeContent(repoPath: string, entry: FileManifestEntry, text: string): Promise<void> {
  const target = join(repoPath, entry.path);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, text, "utf8");
  } catch (error) {
    throw contentError("CONTENT_WRITE_FAILED", `Cannot write ${entry.path}`, {
      context: { path: target },
      cause: error,
    });
  }
}

/**
 * Build one repository under `repoPath`: structure, file contents, schedule,
 * then history replay. Never throws; failures come back as the outcome.
 */
export async function generateRepository(
  spec: RepoSpec,
  repoPath: string,
  rng: Rng,
  options: RepoGeneratorOptions,
): Promise<GeneratedRepository> {
  const startedAt = Date.now();
  let structure: StructureResult | undefined;
  let faultsInjected = 0;

  try {
    structure = await generateStructure(spec, rng, repoPath, { languages: options.languages });
    const year = bootstrapTimestamp(options.now, options.timeline.spanDays).getUTCFullYear();

    for (const entry of structure.manifest) {
      if (entry.kind === "artifact") {
        const text = await options.renderer.render(entry, {
          spec,
          archetype: structure.archetype,
          year,
        });
        await writeContent(repoPath, entry, text);
        continue;
      }

      const result = synthesizeCode(
        { language: entry.language, role: entry.role, lines: entry.targetLines },
        rng,
        { faultInjection: options.faultInjection },
      );
      faultsInjected += result.faultsInjected;
      await writeContent(repoPath, entry, result.text);
    }

    const commits = scheduleCommits(
      {
        files: structure.manifest.map((entry) => entry.path),
        bootstrapFiles: BOOTSTRAP_FILES,
        targetCommits: spec.targetCommits,
        contributors: spec.contributors,
        now: options.now,
        timeline: options.timeline,
      },
      rng,
    );

    const replay = await replayHistory(options.backend, repoPath, commits);

    return {
      spec,
      path: repoPath,
      archetype: structure.archetype,
      manifest: structure.manifest,
      commits,
      status: replay.status,
      commitsApplied: replay.commitsApplied,
      faultsInjected,
      durationMs: Date.now() - startedAt,
      ...(replay.error ? { error: replay.error } : {}),
    };
  } catch (error) {
    return {
      spec,
      path: repoPath,
      archetype: structure?.archetype,
      manifest: structure?.manifest ?? [],
      commits: [],
      status: "failed",
      commitsApplied: 0,
      faultsInjected,
      durationMs: Date.now() - startedAt,
      error: normalizeError(error),
    };
  }
}
