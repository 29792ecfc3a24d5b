import { EventEmitter } from "eventemitter3";

import type { SynthError } from "./errors.js";
import type { GeneratedRepository, QuotaSlot, RepoSpec, RunSummary } from "./types.js";

export interface SynthEvents {
  "run:started": { seed: string; targetCount: number; outputDir: string };
  "repo:started": { index: number; spec: RepoSpec };
  "repo:skipped": { index: number; name: string; path: string };
  "repo:completed": { index: number; repository: GeneratedRepository };
  "repo:failed": { index: number; name: string; error: SynthError };
  "category:started": { slot: QuotaSlot; quota: number };
  "run:completed": { summary: RunSummary };
}

type SynthEventArgs = {
  [K in keyof SynthEvents]: [payload: SynthEvents[K]];
};

export type SynthEventBus = EventEmitter<SynthEventArgs>;

export function createEventBus(): SynthEventBus {
  return new EventEmitter<SynthEventArgs>();
}
