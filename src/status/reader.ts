import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { simpleGit } from "simple-git";

import { normalizeError } from "../core/index.js";
import { buildGitEnv } from "../vcs/index.js";

export const DEFAULT_STATUS_TARGET = 1_000;
export const DEFAULT_LATEST_COUNT = 5;
/** Per-repository estimate used until two repositories give a real interval. */
export const DEFAULT_SECONDS_PER_REPO = 180;

const REPO_DIR_PREFIX = "repo-";

export interface CommitCounter {
  countCommits(repoPath: string): Promise<number>;
}

export const gitCommitCounter: CommitCounter = {
  async countCommits(repoPath) {
    const output = await simpleGit({ baseDir: repoPath })
      .env(buildGitEnv())
      .raw(["rev-list", "--count", "HEAD"]);
    const count = Number.parseInt(output.trim(), 10);
    if (!Number.isFinite(count)) {
      throw new Error(`Unexpected rev-list output: ${output.trim()}`);
    }
    return count;
  },
};

export interface RepositoryStatus {
  name: string;
  /** `null` when the history cannot be read. */
  commits: number | null;
  /** `null` when the directory cannot be read. */
  files: number | null;
}

export interface CorpusStatus {
  outputDir: string;
  total: number;
  target: number;
  progressPercent: number;
  remaining: number;
  estimatedRemainingSeconds: number;
  repositories: RepositoryStatus[];
}

export interface StatusOptions {
  target?: number;
  latest?: number;
  git?: CommitCounter;
}

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    const normalized = normalizeError(error);
    if (normalized.context?.errno === "ENOENT") {
      return [];
    }
    throw normalized;
  }
}

/** Regular files under `dir`, not descending into `.git`. */
export async function countFiles(dir: string): Promise<number> {
  let count = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      if (entry.name !== ".git") count += await countFiles(join(dir, entry.name));
    } else if (entry.isFile()) {
      count += 1;
    }
  }
  return count;
}

function meanIntervalSeconds(times: number[]): number | undefined {
  if (times.length < 2) return undefined;
  const sorted = [...times].sort((a, b) => a - b);
  return (sorted[sorted.length - 1] - sorted[0]) / (sorted.length - 1) / 1000;
}

async function readRepository(
  outputDir: string,
  name: string,
  git: CommitCounter,
): Promise<RepositoryStatus> {
  const repoPath = join(outputDir, name);
  let files: number | null = null;
  try {
    files = await countFiles(repoPath);
    return { name, commits: await git.countCommits(repoPath), files };
  } catch {
    return { name, commits: null, files };
  }
}

/**
 * Progress of a corpus directory: how many `repo-*` directories exist, how
 * far that is from `target`, and details for the newest few. Read-only.
 */
export async function readCorpusStatus(
  outputDir: string,
  options: StatusOptions = {},
): Promise<CorpusStatus> {
  const target = options.target ?? DEFAULT_STATUS_TARGET;
  const latest = options.latest ?? DEFAULT_LATEST_COUNT;
  const git = options.git ?? gitCommitCounter;

  const names = (await listEntries(outputDir))
    .filter((entry) => entry.isDirectory() && entry.name.startsWith(REPO_DIR_PREFIX))
    .map((entry) => entry.name)
    .sort();

  const total = names.length;
  const remaining = Math.max(0, target - total);

  const times = await Promise.all(
    names.map(async (name) => (await stat(join(outputDir, name))).mtimeMs),
  );
  const interval = meanIntervalSeconds(times) ?? DEFAULT_SECONDS_PER_REPO;

  const newest = [...names].reverse().slice(0, Math.max(0, latest));
  const repositories: RepositoryStatus[] = [];
  for (const name of newest) {
    repositories.push(await readRepository(outputDir, name, git));
  }

  return {
    outputDir,
    total,
    target,
    progressPercent: target > 0 ? (total / target) * 100 : 100,
    remaining,
    estimatedRemainingSeconds: Math.round(remaining * interval),
    repositories,
  };
}
