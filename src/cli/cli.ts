import { readFileSync } from "node:fs";

import { Command } from "commander";

import { createDoctorCommand } from "./commands/doctor.js";
import { createGenerateCommand } from "./commands/generate.js";
import { createPlanCommand } from "./commands/plan.js";
import { createStatusCommand } from "./commands/status.js";

export const DEFAULT_CONFIG_FILE = "reposynth.config.ts";

export interface GlobalCliOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  color?: boolean;
}

function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      return typeof raw.version === "string" ? raw.version : "0.0.0";
    }
  } catch (error) {
    console.warn(`[reposynth] Cannot read package version: ${String(error)}`);
  }
  return "0.0.0";
}

function registerCommands(program: Command): void {
  program.addCommand(createGenerateCommand());
  program.addCommand(createPlanCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createDoctorCommand());
}

export function createCliProgram(): Command {
  const program = new Command();
  program
    .name("reposynth")
    .description("Generate corpora of synthetic git repositories")
    .version(readPackageVersion())
    .option("--config <path>", "Config file path", DEFAULT_CONFIG_FILE)
    .option("--verbose", "Enable verbose logging", false)
    .option("--quiet", "Suppress non-error output", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  registerCommands(program);

  program.addHelpText(
    "after",
    `\nGetting Started:\n  $ reposynth doctor              Verify git and Node.js are available\n  $ reposynth plan --count 10     Preview the next repositories\n  $ reposynth generate --count 10 Generate them under ./corpus\n  $ reposynth status              Show corpus progress\n`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = createCliProgram();
  await program.parseAsync([...argv]);
}
