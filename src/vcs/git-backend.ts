import { type SimpleGit, simpleGit } from "simple-git";

import {
  type Commit,
  type Contributor,
  type SynthError,
  type VcsErrorCode,
  normalizeError,
  vcsError,
} from "../core/index.js";
import { buildGitEnv } from "./git-env.js";

const GIT_TIMEOUT_MS = 60_000;

/**
 * The four version-control operations a generated history needs. Each call
 * resolves on success and rejects with a `VCS_*` `SynthError` otherwise.
 */
export interface VcsBackend {
  init(repoPath: string): Promise<void>;
  setIdentity(repoPath: string, contributor: Contributor): Promise<void>;
  stage(repoPath: string, file: string): Promise<void>;
  /** Commit staged files with author and committer dates both set to `date`. */
  commit(repoPath: string, message: string, date: Date): Promise<void>;
}

/** `@<unix seconds> +0000`, git's raw date format. */
export function formatGitDate(date: Date): string {
  return `@${Math.floor(date.getTime() / 1000)} +0000`;
}

export interface GitBackendOptions {
  timeoutMs?: number;
}

export class GitBackend implements VcsBackend {
  private readonly timeoutMs: number;

  public constructor(options: GitBackendOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? GIT_TIMEOUT_MS;
  }

  public async init(repoPath: string): Promise<void> {
    await this.run("VCS_INIT_FAILED", repoPath, "init", async () => {
      await this.git(repoPath).init(["--initial-branch=main"]);
    });
  }

  public async setIdentity(repoPath: string, contributor: Contributor): Promise<void> {
    await this.run("VCS_IDENTITY_FAILED", repoPath, "set identity", async () => {
      const git = this.git(repoPath);
      await git.addConfig("user.name", contributor.name);
      await git.addConfig("user.email", contributor.email);
    });
  }

  public async stage(repoPath: string, file: string): Promise<void> {
    await this.run("VCS_STAGE_FAILED", repoPath, `stage ${file}`, async () => {
      await this.git(repoPath).add(file);
    });
  }

  public async commit(repoPath: string, message: string, date: Date): Promise<void> {
    const gitDate = formatGitDate(date);
    await this.run("VCS_COMMIT_FAILED", repoPath, "commit", async () => {
      await this.git(repoPath, { GIT_AUTHOR_DATE: gitDate, GIT_COMMITTER_DATE: gitDate }).commit(
        message,
        undefined,
        { "--no-gpg-sign": null },
      );
    });
  }

  /** `.env()` replaces the whole child environment, so it gets the filtered parent env. */
  private git(repoPath: string, extraEnv: Record<string, string> = {}): SimpleGit {
    return simpleGit({ baseDir: repoPath, timeout: { block: this.timeoutMs } }).env(
      buildGitEnv(extraEnv),
    );
  }

  private async run(
    code: VcsErrorCode,
    repoPath: string,
    operation: string,
    action: () => Promise<void>,
  ): Promise<void> {
    try {
      await action();
    } catch (error) {
      throw vcsError(code, `git ${operation} failed in ${repoPath}`, {
        context: { repoPath, operation },
        cause: error,
      });
    }
  }
}

export interface ReplayResult {
  status: "success" | "partial" | "failed";
  commitsApplied: number;
  error?: SynthError;
}

/**
 * Initialize `repoPath` and apply `commits` in order. Stops at the first
 * backend failure; earlier commits stay in place.
 */
export async function replayHistory(
  backend: VcsBackend,
  repoPath: string,
  commits: readonly Commit[],
): Promise<ReplayResult> {
  let commitsApplied = 0;

  try {
    await backend.init(repoPath);
    for (const commit of commits) {
      await backend.setIdentity(repoPath, commit.author);
      for (const file of commit.files) {
        await backend.stage(repoPath, file);
      }
      await backend.commit(repoPath, commit.message, commit.timestamp);
      commitsApplied += 1;
    }
  } catch (error) {
    return {
      status: commitsApplied > 0 ? "partial" : "failed",
      commitsApplied,
      error: normalizeError(error),
    };
  }

  return { status: "success", commitsApplied };
}
