import type { ChalkInstance } from "chalk";
import Table from "cli-table3";
import { Command } from "commander";

import { type CorpusStatus, readCorpusStatus } from "../../status/index.js";
import {
  createUi,
  formatDuration,
  formatInteger,
  getGlobalOptions,
  loadOptionalConfig,
  parseInteger,
} from "../helpers.js";

interface StatusCommandOptions {
  output?: string;
  target?: number;
  latest?: number;
}

export function createStatusCommand(): Command {
  const command = new Command("status");

  command
    .description("Show corpus generation progress")
    .option("--output <dir>", "Corpus directory")
    .option("--target <n>", "Repository count that counts as complete", parseInteger)
    .option("--latest <n>", "Number of newest repositories to list", parseInteger, 5)
    .action(async (options: StatusCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);

      if (globalOptions.quiet && !globalOptions.json) {
        return;
      }

      const fileConfig = await loadOptionalConfig(globalOptions.config, globalOptions.verbose, ui);
      const status = await readCorpusStatus(options.output ?? fileConfig?.outputDir ?? "./corpus", {
        target: options.target ?? fileConfig?.targetCount,
        latest: options.latest,
      });

      if (globalOptions.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      renderStatusOutput(ui, status);
    });

  return command;
}

function renderStatusOutput(ui: ChalkInstance, status: CorpusStatus): void {
  console.log(ui.bold(`Corpus status for ${status.outputDir}`));
  console.log("");
  console.log(`  Generated: ${formatInteger(status.total)} / ${formatInteger(status.target)}`);
  console.log(`  Progress:  ${status.progressPercent.toFixed(1)}%`);

  if (status.remaining > 0) {
    console.log(`  Remaining: ${formatInteger(status.remaining)}`);
    console.log(`  Est. time: ${formatDuration(status.estimatedRemainingSeconds)}`);
  } else {
    console.log(ui.green("  Target reached."));
  }
  console.log("");

  if (status.repositories.length === 0) {
    console.log(ui.yellow("No repositories generated yet."));
    return;
  }

  const table = new Table({ head: ["Repository", "Commits", "Files"] });
  for (const repository of status.repositories) {
    table.push([
      repository.name,
      repository.commits === null ? ui.red("?") : formatInteger(repository.commits),
      repository.files === null ? ui.red("?") : formatInteger(repository.files),
    ]);
  }

  console.log(ui.bold(`Latest ${status.repositories.length} repositories`));
  console.log(table.toString());
}
