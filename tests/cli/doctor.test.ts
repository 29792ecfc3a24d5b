import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  createDoctorCommand,
  extractVersion,
  isVersionAtLeast,
} from "../../src/cli/commands/doctor.js";

const mockedExeca = vi.fn();

vi.mock("execa", () => ({
  execa: (...args: unknown[]) => mockedExeca(...args),
}));

interface DoctorCheck {
  id: string;
  status: "pass" | "warn" | "fail";
  value: string;
  message?: string;
}

interface DoctorPayload {
  checks: DoctorCheck[];
  allPassed: boolean;
}

interface MockCommandResult {
  stdout?: string;
  stderr?: string;
  exitCode?: number | null;
  error?: NodeJS.ErrnoException;
}

const originalNodeVersion = process.versions.node;

function setNodeVersion(version: string): void {
  Object.defineProperty(process.versions, "node", {
    configurable: true,
    enumerable: true,
    value: version,
  });
}

function mockGit(result: MockCommandResult): void {
  mockedExeca.mockImplementation((command: string) => {
    if (command !== "git") {
      throw new Error(`Unexpected command call: ${command}`);
    }

    if (result.error) {
      throw result.error;
    }

    return {
      exitCode: result.exitCode ?? 0,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
    };
  });
}

let outputRoot: string;

async function runDoctorJsonCommand(outputDir = outputRoot): Promise<DoctorPayload> {
  const root = new Command()
    .option("--config <path>", "Config file path", "reposynth.config.ts")
    .option("--verbose", "Enable verbose logging", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  root.addCommand(createDoctorCommand());

  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  await root.parseAsync(["node", "reposynth", "--json", "doctor", "--output", outputDir]);

  const output = logSpy.mock.calls.at(-1)?.[0];
  if (typeof output !== "string") {
    throw new Error("Doctor command did not emit JSON output.");
  }

  return JSON.parse(output) as DoctorPayload;
}

function getCheck(payload: DoctorPayload, id: string): DoctorCheck | undefined {
  return payload.checks.find((entry) => entry.id === id);
}

beforeEach(async () => {
  outputRoot = await mkdtemp(join(tmpdir(), "reposynth-doctor-"));
  vi.restoreAllMocks();
  mockedExeca.mockReset();
  setNodeVersion(originalNodeVersion);
  process.exitCode = 0;
});

afterEach(async () => {
  await rm(outputRoot, { recursive: true, force: true });
});

describe("createDoctorCommand", () => {
  it("returns a Commander Command instance", () => {
    expect(createDoctorCommand().name()).toBe("doctor");
  });
});

describe("node check", () => {
  const cases = [
    { version: "20.0.0", expected: true },
    { version: "20.11.1", expected: true },
    { version: "22.3.0", expected: true },
    { version: "19.9.9", expected: false },
    { version: "18.20.4", expected: false },
  ] as const;

  for (const testCase of cases) {
    it(`marks node ${testCase.version} as ${testCase.expected ? "pass" : "fail"}`, async () => {
      setNodeVersion(testCase.version);
      mockGit({ stdout: "git version 2.43.0\n" });

      const payload = await runDoctorJsonCommand();

      expect(getCheck(payload, "node")).toMatchObject({
        status: testCase.expected ? "pass" : "fail",
        value: `v${testCase.version}`,
      });
      expect(payload.allPassed).toBe(testCase.expected);
      expect(process.exitCode).toBe(testCase.expected ? 0 : 1);
    });
  }
});

describe("git check", () => {
  it("passes a recent git", async () => {
    setNodeVersion("20.11.1");
    mockGit({ stdout: "git version 2.43.0\n" });

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "git")).toMatchObject({ status: "pass", value: "v2.43.0" });
    expect(mockedExeca).toHaveBeenCalledWith("git", ["--version"], {
      reject: false,
      timeout: 30_000,
      stdin: "ignore",
    });
  });

  it("warns about a git without --initial-branch", async () => {
    setNodeVersion("20.11.1");
    mockGit({ stdout: "git version 2.25.1\n" });

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "git")).toMatchObject({
      status: "warn",
      value: "v2.25.1",
      message: "git 2.28.0+ is recommended for --initial-branch support.",
    });
    expect(payload.allPassed).toBe(true);
  });

  it("fails when git is missing", async () => {
    setNodeVersion("20.11.1");
    mockGit({ error: Object.assign(new Error("spawn git ENOENT"), { code: "ENOENT" }) });

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "git")).toMatchObject({
      status: "fail",
      value: "--",
      message: "git is not installed or not in PATH.",
    });
    expect(payload.allPassed).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  it("reports stderr when git exits non-zero", async () => {
    setNodeVersion("20.11.1");
    mockGit({ exitCode: 1, stderr: "git: broken install\n" });

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "git")).toMatchObject({
      status: "fail",
      message: "git: broken install",
    });
  });
});

describe("corpus and output checks", () => {
  it("confirms the bundled tables load", async () => {
    setNodeVersion("20.11.1");
    mockGit({ stdout: "git version 2.43.0\n" });

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "corpus")).toMatchObject({ status: "pass", value: "20 categories" });
  });

  it("accepts an output directory that does not exist yet", async () => {
    setNodeVersion("20.11.1");
    mockGit({ stdout: "git version 2.43.0\n" });
    const outputDir = join(outputRoot, "nested", "corpus");

    const payload = await runDoctorJsonCommand(outputDir);

    expect(getCheck(payload, "output")).toMatchObject({ status: "pass", value: outputDir });
    expect(payload.checks.map((check) => check.id)).toEqual(["node", "git", "corpus", "output"]);
  });
});

describe("version helpers", () => {
  it("extracts versions from command output", () => {
    expect(extractVersion("git version 2.43.0")).toBe("v2.43.0");
    expect(extractVersion("v20.11.1")).toBe("v20.11.1");
    expect(extractVersion("no version here")).toBeUndefined();
  });

  it("compares dotted versions numerically", () => {
    expect(isVersionAtLeast("2.28.0", "2.28.0")).toBe(true);
    expect(isVersionAtLeast("2.100.0", "2.28.0")).toBe(true);
    expect(isVersionAtLeast("2.9.5", "2.28.0")).toBe(false);
  });
});
