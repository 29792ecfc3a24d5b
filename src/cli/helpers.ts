import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { Command } from "commander";
import ora, { type Ora } from "ora";

import { type SynthConfig, loadConfig } from "../core/index.js";
import { DEFAULT_CONFIG_FILE, type GlobalCliOptions } from "./cli.js";
import { loadOptionalConfigFile } from "./config-loader.js";

export type { GlobalCliOptions } from "./cli.js";

// ── Global options ──────────────────────────────────────────

export function getGlobalOptions(command: Command): Required<GlobalCliOptions> {
  const options = command.optsWithGlobals<GlobalCliOptions>();

  return {
    config: options.config ?? DEFAULT_CONFIG_FILE,
    verbose: options.verbose === true,
    quiet: options.quiet === true,
    json: options.json === true,
    color: options.color !== false,
  };
}

// ── UI helpers ──────────────────────────────────────────────

export function createUi(options: Required<GlobalCliOptions>): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  const colorEnabled = options.color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/**
 * Creates a spinner when output is interactive (non-JSON / non-quiet).
 * Pass `true` to suppress the spinner.
 */
export function createSpinner(suppress: boolean, text: string): Ora | null {
  if (suppress) {
    return null;
  }

  return ora({ text, color: "blue" }).start();
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected an integer but received "${value}".`);
  }

  return parsed;
}

export function parseProbability(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`Expected a probability between 0 and 1 but received "${value}".`);
  }

  return parsed;
}

// ── Formatting helpers ──────────────────────────────────────

export function formatInteger(value: number): string {
  return new Intl.NumberFormat("en-US").format(value);
}

/** `42s`, `3m 05s`, `2h 07m`. */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ${String(seconds % 60).padStart(2, "0")}s`;
  }

  return `${Math.floor(minutes / 60)}h ${String(minutes % 60).padStart(2, "0")}m`;
}

// ── Config helpers ──────────────────────────────────────────

export async function loadOptionalConfig(
  configPath: string,
  verbose: boolean,
  ui: ChalkInstance,
): Promise<SynthConfig | null> {
  return loadOptionalConfigFile(configPath, {
    onWarning: (message) => {
      if (verbose) console.warn(ui.yellow(`[reposynth] ${message}`));
    },
  });
}

export interface ConfigOverrides {
  outputDir?: string;
  targetCount?: number;
  startIndex?: number;
  seed?: string;
  concurrency?: number;
  skipExisting?: boolean;
  faultProbability?: number;
}

/** Layer command-line flags over the file config (or the defaults) and revalidate. */
export function resolveRunConfig(
  fileConfig: SynthConfig | null,
  overrides: ConfigOverrides,
): SynthConfig {
  const base = fileConfig ?? loadConfig({});
  return loadConfig({
    ...base,
    ...(overrides.outputDir !== undefined ? { outputDir: overrides.outputDir } : {}),
    ...(overrides.targetCount !== undefined ? { targetCount: overrides.targetCount } : {}),
    ...(overrides.startIndex !== undefined ? { startIndex: overrides.startIndex } : {}),
    ...(overrides.seed !== undefined ? { seed: overrides.seed } : {}),
    ...(overrides.concurrency !== undefined ? { concurrency: overrides.concurrency } : {}),
    ...(overrides.skipExisting !== undefined ? { skipExisting: overrides.skipExisting } : {}),
    faultInjection: {
      ...base.faultInjection,
      ...(overrides.faultProbability !== undefined
        ? { probability: overrides.faultProbability }
        : {}),
    },
  });
}
