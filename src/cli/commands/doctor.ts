import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import type { ChalkInstance } from "chalk";
import { Command } from "commander";

import { DEFAULT_TEMPLATES_DIR } from "../../artifacts/index.js";
import { isRecord, loadBundledCorpus, pathExists } from "../../core/index.js";
import { createUi, getGlobalOptions } from "../helpers.js";

type DoctorStatus = "pass" | "warn" | "fail";

export interface DoctorCheck {
  id: "node" | "git" | "corpus" | "output";
  name: string;
  requirement: string;
  value: string;
  status: DoctorStatus;
  message?: string;
}

export interface DoctorOptions {
  outputDir?: string;
}

interface ProbeResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  spawnError?: { code?: string; message: string };
}

const MINIMUM_NODE_VERSION = "20.0.0";
/** `--initial-branch` needs git 2.28. */
const MINIMUM_GIT_VERSION = "2.28.0";
const PROBE_TIMEOUT_MS = 30_000;

export function createDoctorCommand(): Command {
  return new Command("doctor")
    .description("Check that this machine can generate a corpus")
    .option("--output <dir>", "Corpus directory to check for write access", "./corpus")
    .action(async (options: { output: string }, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const checks = await runDoctorChecks({ outputDir: options.output });
      const allPassed = checks.every((check) => check.status !== "fail");

      if (globalOptions.json) {
        console.log(JSON.stringify({ checks, allPassed }, null, 2));
      } else {
        printChecks(createUi(globalOptions), checks, allPassed);
      }

      if (!allPassed) process.exitCode = 1;
    });
}

export async function runDoctorChecks(options: DoctorOptions = {}): Promise<DoctorCheck[]> {
  return [
    checkNode(),
    await checkGit(),
    await checkCorpusData(),
    await checkOutputDir(resolve(options.outputDir ?? "./corpus")),
  ];
}

function checkNode(): DoctorCheck {
  const version = process.versions.node;
  const ok = isVersionAtLeast(version, MINIMUM_NODE_VERSION);
  return {
    id: "node",
    name: "Node.js",
    requirement: `>= ${MINIMUM_NODE_VERSION}`,
    value: `v${version}`,
    status: ok ? "pass" : "fail",
    ...(ok ? {} : { message: `Node.js ${MINIMUM_NODE_VERSION}+ is required.` }),
  };
}

async function checkGit(): Promise<DoctorCheck> {
  const result = await probe("git", ["--version"]);
  const version = extractVersion(result.stdout);
  const base = {
    id: "git" as const,
    name: "git",
    requirement: `>= ${MINIMUM_GIT_VERSION}`,
    value: version ?? "--",
  };

  if (result.spawnError || result.exitCode !== 0) {
    return { ...base, status: "fail", message: describeProbeFailure("git", result) };
  }
  if (version === undefined || !isVersionAtLeast(version.slice(1), MINIMUM_GIT_VERSION)) {
    return {
      ...base,
      status: "warn",
      message: `git ${MINIMUM_GIT_VERSION}+ is recommended for --initial-branch support.`,
    };
  }
  return { ...base, status: "pass" };
}

async function checkCorpusData(): Promise<DoctorCheck> {
  const base = { id: "corpus" as const, name: "Corpus data", requirement: "bundled" };
  let categories: number;
  try {
    categories = loadBundledCorpus().categories.length;
  } catch (error) {
    return {
      ...base,
      value: "--",
      status: "fail",
      message: `data/corpus.json is unreadable: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!(await pathExists(DEFAULT_TEMPLATES_DIR))) {
    return {
      ...base,
      value: `${categories} categories`,
      status: "fail",
      message: `Template directory ${DEFAULT_TEMPLATES_DIR} is missing.`,
    };
  }
  return { ...base, value: `${categories} categories`, status: "pass" };
}

async function checkOutputDir(outputDir: string): Promise<DoctorCheck> {
  const base = { id: "output" as const, name: "Output dir", requirement: "writable" };
  // The directory may not exist yet; the nearest existing ancestor is what gets written to.
  let target = outputDir;
  while (!(await pathExists(target)) && dirname(target) !== target) {
    target = dirname(target);
  }

  try {
    await access(target, constants.W_OK);
    return { ...base, value: outputDir, status: "pass" };
  } catch {
    return { ...base, value: outputDir, status: "fail", message: `${target} is not writable.` };
  }
}

function printChecks(ui: ChalkInstance, checks: DoctorCheck[], allPassed: boolean): void {
  const icons = { pass: ui.green("[OK]"), warn: ui.yellow("[!]"), fail: ui.red("[X]") };
  const colors = { pass: ui.green, warn: ui.yellow, fail: ui.red };

  console.log("Checking environment...\n");
  for (const check of checks) {
    console.log(
      `  ${icons[check.status]} ${check.name.padEnd(12)} ${check.requirement.padEnd(10)} ${check.value}`,
    );
    if (check.message) {
      console.log(`      ${colors[check.status](check.message)}`);
    }
  }
  console.log("");
  console.log(allPassed ? ui.green("Ready to generate.") : ui.red("Some checks failed."));
}

export function extractVersion(output: string): string | undefined {
  const match = /v?(\d+\.\d+\.\d+)/i.exec(output);
  return match ? `v${match[1]}` : undefined;
}

export function isVersionAtLeast(version: string, minimum: string): boolean {
  const current = version.split(".").map((part) => Number.parseInt(part, 10));
  const required = minimum.split(".").map((part) => Number.parseInt(part, 10));

  for (let index = 0; index < Math.max(current.length, required.length); index += 1) {
    const delta = (current[index] ?? 0) - (required[index] ?? 0);
    if (delta !== 0) return delta > 0;
  }
  return true;
}

function describeProbeFailure(command: string, result: ProbeResult): string {
  if (result.spawnError?.code === "ENOENT") {
    return `${command} is not installed or not in PATH.`;
  }
  return (
    result.spawnError?.message ||
    result.stderr.trim() ||
    `${command} exited with code ${String(result.exitCode)}.`
  );
}

async function probe(command: string, args: string[]): Promise<ProbeResult> {
  try {
    const { execa } = await import("execa");
    const result = await execa(command, args, {
      reject: false,
      timeout: PROBE_TIMEOUT_MS,
      stdin: "ignore",
    });
    return {
      exitCode: result.exitCode ?? null,
      stdout: String(result.stdout),
      stderr: String(result.stderr),
    };
  } catch (error) {
    return {
      exitCode: null,
      stdout: "",
      stderr: "",
      spawnError: {
        ...(isRecord(error) && typeof error.code === "string" ? { code: error.code } : {}),
        message: error instanceof Error ? error.message : String(error),
      },
    };
  }
}
