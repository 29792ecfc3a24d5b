import Table from "cli-table3";
import { Command } from "commander";

import { resolveSeed, planRepositories } from "../../generation/index.js";
import {
  createUi,
  formatInteger,
  getGlobalOptions,
  loadOptionalConfig,
  parseInteger,
  resolveRunConfig,
} from "../helpers.js";

interface PlanCommandOptions {
  count?: number;
  start?: number;
  seed?: string;
}

const DEFAULT_PLAN_COUNT = 20;

export function createPlanCommand(): Command {
  const command = new Command("plan");

  command
    .description("Preview the repositories the next run would generate")
    .option("--count <n>", "Number of repositories to preview", parseInteger)
    .option("--start <id>", "First repository index", parseInteger)
    .option("--seed <seed>", "Seed for reproducible output")
    .action(async (options: PlanCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);

      const fileConfig = await loadOptionalConfig(globalOptions.config, globalOptions.verbose, ui);
      const config = resolveRunConfig(fileConfig, { startIndex: options.start });
      const seed = resolveSeed(options.seed ?? config.seed);
      const planned = planRepositories(config, seed, options.count ?? DEFAULT_PLAN_COUNT);

      if (globalOptions.json) {
        console.log(
          JSON.stringify(
            {
              seed,
              repositories: planned.map(({ spec, archetype }) => ({
                id: spec.id,
                name: spec.name,
                category: spec.category,
                archetype,
                language: spec.language,
                targetLines: spec.targetLines,
                targetCommits: spec.targetCommits,
                contributors: spec.contributors.map((contributor) => contributor.name),
              })),
            },
            null,
            2,
          ),
        );
        return;
      }

      if (globalOptions.quiet) {
        return;
      }

      const table = new Table({
        head: ["ID", "Name", "Category", "Archetype", "Language", "Lines", "Commits", "Contributors"],
      });

      for (const { spec, archetype } of planned) {
        table.push([
          String(spec.id),
          spec.name,
          spec.category,
          archetype,
          spec.language,
          formatInteger(spec.targetLines),
          formatInteger(spec.targetCommits),
          String(spec.contributorCount),
        ]);
      }

      console.log(ui.bold(`Plan for seed ${seed}`));
      console.log("");
      if (planned.length > 0) {
        console.log(table.toString());
      } else {
        console.log(ui.yellow("The category table has no slots."));
      }
      console.log("");
      console.log(ui.dim(`Run \`reposynth generate --seed ${seed}\` to produce these repositories.`));
    });

  return command;
}
