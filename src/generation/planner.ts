import { type Archetype, type RepoSpec, type SynthConfig, deriveRng } from "../core/index.js";
import { SpecSelector } from "../selection/index.js";
import { classifyArchetype } from "../structure/index.js";

export interface PlannedRepository {
  spec: RepoSpec;
  archetype: Archetype;
}

/**
 * The first `count` specs a run with `seed` would draw, without touching the
 * output directory. Skipped slots still consume their index, so a plan lines
 * up with `runGeneration` slot for slot.
 */
export function planRepositories(
  config: SynthConfig,
  seed: string,
  count: number = config.targetCount,
): PlannedRepository[] {
  const selector = SpecSelector.fromConfig(config);
  const planned: PlannedRepository[] = [];
  let index = config.startIndex;

  for (const slot of selector.slots()) {
    if (planned.length >= count) break;
    const spec = selector.select(slot, index, deriveRng(seed, index));
    planned.push({ spec, archetype: classifyArchetype(spec) });
    index += 1;
  }

  return planned;
}
