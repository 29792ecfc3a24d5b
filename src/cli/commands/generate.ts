import type { ChalkInstance } from "chalk";
import { Command } from "commander";

import { type RunSummary, type SynthEventBus, createEventBus } from "../../core/index.js";
import { resolveSeed, runGeneration } from "../../generation/index.js";
import {
  createSpinner,
  createUi,
  formatDuration,
  formatInteger,
  getGlobalOptions,
  loadOptionalConfig,
  parseInteger,
  parseProbability,
  resolveRunConfig,
} from "../helpers.js";

interface GenerateCommandOptions {
  output?: string;
  count?: number;
  start?: number;
  seed?: string;
  concurrency?: number;
  skipExisting?: boolean;
  faultProbability?: number;
}

export function createGenerateCommand(): Command {
  const command = new Command("generate");

  command
    .description("Generate synthetic repositories into the output directory")
    .option("--output <dir>", "Output directory")
    .option("--count <n>", "Number of repositories to produce", parseInteger)
    .option("--start <id>", "First repository index", parseInteger)
    .option("--seed <seed>", "Seed for reproducible output")
    .option("--concurrency <n>", "Repositories generated in parallel", parseInteger)
    .option("--no-skip-existing", "Regenerate into directories that already exist")
    .option("--fault-probability <p>", "Chance of a defect per generated unit", parseProbability)
    .action(async (options: GenerateCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const suppressOutput = globalOptions.quiet || globalOptions.json;

      const fileConfig = await loadOptionalConfig(globalOptions.config, globalOptions.verbose, ui);
      const config = resolveRunConfig(fileConfig, {
        outputDir: options.output,
        targetCount: options.count,
        startIndex: options.start,
        // Pin the seed here so the summary and the run agree on it.
        seed: resolveSeed(options.seed ?? fileConfig?.seed),
        concurrency: options.concurrency,
        skipExisting: options.skipExisting,
        faultProbability: options.faultProbability,
      });

      const bus = createEventBus();
      if (!suppressOutput) {
        attachProgressOutput(bus, ui, globalOptions.verbose);
      }

      const summary = await runGeneration(config, { bus });

      if (globalOptions.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else if (!globalOptions.quiet) {
        renderSummary(ui, summary);
      }

      if (summary.failed > 0) {
        process.exitCode = 1;
      }
    });

  return command;
}

function attachProgressOutput(bus: SynthEventBus, ui: ChalkInstance, verbose: boolean): void {
  let spinner = createSpinner(false, "Starting generation...");

  const log = (line: string): void => {
    spinner?.stop();
    console.log(line);
    spinner?.start();
  };

  bus.on("run:started", ({ seed, targetCount, outputDir }) => {
    log(ui.bold(`Generating ${formatInteger(targetCount)} repositories into ${outputDir}`));
    log(ui.dim(`Seed: ${seed}`));
  });

  bus.on("category:started", ({ slot, quota }) => {
    if (verbose) log(ui.blue(`[reposynth] Category ${slot.category} (${quota} slots)`));
  });

  bus.on("repo:started", ({ spec }) => {
    if (spinner) spinner.text = `Generating ${spec.name} (${spec.language})...`;
  });

  bus.on("repo:skipped", ({ name }) => {
    if (verbose) log(ui.dim(`  - ${name} exists, skipped`));
  });

  bus.on("repo:completed", ({ repository }) => {
    const details = `${repository.spec.language}, ${repository.commitsApplied} commits, ${repository.manifest.length} files`;
    if (repository.status === "partial") {
      log(ui.yellow(`  ! ${repository.spec.name} (${details}) ${repository.error?.message ?? ""}`));
    } else {
      log(`  ${ui.green("✓")} ${repository.spec.name} ${ui.dim(`(${details})`)}`);
    }
  });

  bus.on("repo:failed", ({ name, error }) => {
    log(ui.red(`  ✗ ${name}: [${error.code}] ${error.message}`));
  });

  bus.on("run:completed", () => {
    spinner?.stop();
    spinner = null;
  });
}

function renderSummary(ui: ChalkInstance, summary: RunSummary): void {
  console.log("");
  console.log(ui.bold("Generation Summary"));
  console.log(`  Generated: ${formatInteger(summary.generated)}`);
  if (summary.partial > 0) console.log(`  Partial:   ${formatInteger(summary.partial)}`);
  console.log(`  Skipped:   ${formatInteger(summary.skipped)}`);
  console.log(`  Failed:    ${formatInteger(summary.failed)}`);
  console.log(`  Commits:   ${formatInteger(summary.totalCommits)}`);
  console.log(`  Files:     ${formatInteger(summary.totalFiles)}`);
  console.log(`  Next index: ${summary.nextIndex}`);
  console.log(`  Duration:  ${formatDuration(summary.durationMs / 1000)}`);

  for (const failure of summary.failures) {
    console.log(ui.red(`  ${failure.name}: [${failure.code}] ${failure.message}`));
  }
}
