import { join, resolve } from "node:path";
import PQueue from "p-queue";

import { ArtifactRenderer } from "../artifacts/renderer.js";
import {
  type GeneratedRepository,
  type QuotaSlot,
  type RunSummary,
  type SynthConfig,
  type SynthEventBus,
  createEventBus,
  deriveRng,
  formatRepoName,
  normalizeError,
  pathExists,
  randomSeed,
} from "../core/index.js";
import { SpecSelector } from "../selection/index.js";
import { GitBackend, type VcsBackend } from "../vcs/index.js";
import { generateRepository } from "./repo-generator.js";

export interface GenerationDeps {
  backend?: VcsBackend;
  bus?: SynthEventBus;
  /** Reference "now" for every repository timeline in the run. */
  clock?: () => Date;
  renderer?: ArtifactRenderer;
}

export function resolveSeed(seed: SynthConfig["seed"]): string {
  return seed === undefined ? randomSeed() : String(seed);
}

/**
 * Walk the category quota and generate repositories until `targetCount` of
 * them exist (generated, partial or already on disk) or the quota runs out.
 * Every slot consumes an index, whether it is generated, skipped or fails.
 */
export async function runGeneration(
  config: SynthConfig,
  deps: GenerationDeps = {},
): Promise<RunSummary> {
  const startedAt = Date.now();
  const backend = deps.backend ?? new GitBackend();
  const bus = deps.bus ?? createEventBus();
  const renderer = deps.renderer ?? new ArtifactRenderer();
  const clock = deps.clock ?? (() => new Date());

  const seed = resolveSeed(config.seed);
  const outputDir = resolve(config.outputDir);
  const selector = SpecSelector.fromConfig(config);
  const queue = new PQueue({ concurrency: config.concurrency });

  const summary: RunSummary = {
    seed,
    outputDir,
    startIndex: config.startIndex,
    nextIndex: config.startIndex,
    targetCount: config.targetCount,
    generated: 0,
    partial: 0,
    failed: 0,
    skipped: 0,
    totalCommits: 0,
    totalFiles: 0,
    failures: [],
    durationMs: 0,
  };

  let pending = 0;
  // Directories skipped on resume were produced by an earlier run.
  const produced = (): number => summary.generated + summary.partial + summary.skipped;

  const record = (index: number, repository: GeneratedRepository): void => {
    summary.totalCommits += repository.commitsApplied;
    if (repository.status === "success" || repository.status === "partial") {
      summary.totalFiles += repository.manifest.length;
    }
    if (repository.status === "success") summary.generated += 1;
    if (repository.status === "partial") summary.partial += 1;
    if (repository.status === "failed") summary.failed += 1;

    if (repository.error) {
      summary.failures.push({
        index,
        name: repository.spec.name,
        code: repository.error.code,
        message: repository.error.message,
      });
    }

    if (repository.status === "failed") {
      bus.emit("repo:failed", {
        index,
        name: repository.spec.name,
        error: repository.error ?? normalizeError(new Error("Repository generation failed")),
      });
    } else {
      bus.emit("repo:completed", { index, repository });
    }
  };

  const processSlot = async (slot: QuotaSlot, index: number): Promise<void> => {
    const rng = deriveRng(seed, index);
    const spec = selector.select(slot, index, rng);
    bus.emit("repo:started", { index, spec });

    const repository = await generateRepository(spec, join(outputDir, spec.name), rng, {
      languages: config.languages,
      timeline: config.timeline,
      faultInjection: config.faultInjection,
      backend,
      renderer,
      now: clock(),
    });
    record(index, repository);
  };

  bus.emit("run:started", { seed, targetCount: config.targetCount, outputDir });

  let index = config.startIndex;
  const quota = new Map(config.categories.map((category) => [category.name, category.count]));

  for (const slot of selector.slots()) {
    // In-flight repositories may still fail, so wait for them before stopping.
    while (produced() + pending >= config.targetCount && pending > 0) {
      await queue.onIdle();
    }
    if (produced() >= config.targetCount) break;

    const slotIndex = index;
    index += 1;
    summary.nextIndex = index;

    if (slot.ordinal === 0) {
      bus.emit("category:started", { slot, quota: quota.get(slot.category) ?? 0 });
    }

    const name = formatRepoName(slotIndex, slot.template);
    const path = join(outputDir, name);
    if (config.skipExisting && (await pathExists(path))) {
      summary.skipped += 1;
      bus.emit("repo:skipped", { index: slotIndex, name, path });
      continue;
    }

    pending += 1;
    void queue.add(async () => {
      try {
        await processSlot(slot, slotIndex);
      } catch (error) {
        const normalized = normalizeError(error);
        summary.failed += 1;
        summary.failures.push({
          index: slotIndex,
          name,
          code: normalized.code,
          message: normalized.message,
        });
        bus.emit("repo:failed", { index: slotIndex, name, error: normalized });
      } finally {
        pending -= 1;
      }
    });

    if (queue.size > 0) {
      await queue.onSizeLessThan(1);
    }
  }

  await queue.onIdle();

  summary.durationMs = Date.now() - startedAt;
  bus.emit("run:completed", { summary });
  return summary;
}
