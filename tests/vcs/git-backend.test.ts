import { beforeEach, describe, expect, it, vi } from "vitest";

import type { Commit, Contributor } from "../../src/core/types.js";
import { vcsError } from "../../src/core/errors.js";

const gitMockState = vi.hoisted(() => {
  const repoGit = {
    init: vi.fn(),
    addConfig: vi.fn(),
    add: vi.fn(),
    commit: vi.fn(),
    env: vi.fn(),
  };
  return { simpleGit: vi.fn(), repoGit };
});

vi.mock("simple-git", () => ({
  simpleGit: vi.fn((options: unknown) => {
    gitMockState.simpleGit(options);
    return gitMockState.repoGit;
  }),
}));

import {
  GitBackend,
  type VcsBackend,
  formatGitDate,
  replayHistory,
} from "../../src/vcs/git-backend.js";

const AUTHOR: Contributor = { name: "Dev One", email: "dev1@example.com" };
const DATE = new Date("2024-06-15T12:34:56.000Z");

beforeEach(() => {
  vi.clearAllMocks();
  gitMockState.repoGit.env.mockReturnValue(gitMockState.repoGit);
  gitMockState.repoGit.init.mockResolvedValue(undefined);
  gitMockState.repoGit.addConfig.mockResolvedValue(undefined);
  gitMockState.repoGit.add.mockResolvedValue(undefined);
  gitMockState.repoGit.commit.mockResolvedValue({ commit: "abc123" });
});

describe("formatGitDate", () => {
  it("uses unix seconds in UTC", () => {
    expect(formatGitDate(DATE)).toBe("@1718454896 +0000");
  });
});

describe("GitBackend", () => {
  it("initializes on main", async () => {
    await new GitBackend().init("/corpus/repo-05001-build-tool");

    expect(gitMockState.simpleGit).toHaveBeenCalledWith({
      baseDir: "/corpus/repo-05001-build-tool",
      timeout: { block: 60_000 },
    });
    expect(gitMockState.repoGit.init).toHaveBeenCalledWith(["--initial-branch=main"]);
  });

  it("disables terminal prompts and keeps PATH", async () => {
    await new GitBackend().init("/corpus/repo");

    const env = gitMockState.repoGit.env.mock.calls[0][0];
    expect(env.GIT_TERMINAL_PROMPT).toBe("0");
    expect(env.PATH).toBe(process.env.PATH);
  });

  it("leaves out the editor variables npm exports", async () => {
    vi.stubEnv("EDITOR", "vi");
    vi.stubEnv("GIT_EDITOR", "vim");
    try {
      await new GitBackend().commit("/corpus/repo", "feat: Add api", DATE);
    } finally {
      vi.unstubAllEnvs();
    }

    const env = gitMockState.repoGit.env.mock.calls[0][0];
    expect(env).not.toHaveProperty("EDITOR");
    expect(env).not.toHaveProperty("GIT_EDITOR");
    expect(env.GIT_COMMITTER_DATE).toBe("@1718454896 +0000");
  });

  it("writes the committer identity into the repository config", async () => {
    await new GitBackend().setIdentity("/corpus/repo", AUTHOR);

    expect(gitMockState.repoGit.addConfig.mock.calls).toEqual([
      ["user.name", "Dev One"],
      ["user.email", "dev1@example.com"],
    ]);
  });

  it("stages one path", async () => {
    await new GitBackend().stage("/corpus/repo", "src/app.py");
    expect(gitMockState.repoGit.add).toHaveBeenCalledWith("src/app.py");
  });

  it("commits with both dates overridden", async () => {
    await new GitBackend().commit("/corpus/repo", "feat: Add api", DATE);

    const env = gitMockState.repoGit.env.mock.calls[0][0];
    expect(env.GIT_AUTHOR_DATE).toBe("@1718454896 +0000");
    expect(env.GIT_COMMITTER_DATE).toBe("@1718454896 +0000");
    expect(gitMockState.repoGit.commit).toHaveBeenCalledWith("feat: Add api", undefined, {
      "--no-gpg-sign": null,
    });
  });

  it.each([
    ["init", "VCS_INIT_FAILED", (backend: GitBackend) => backend.init("/corpus/repo")],
    [
      "addConfig",
      "VCS_IDENTITY_FAILED",
      (backend: GitBackend) => backend.setIdentity("/corpus/repo", AUTHOR),
    ],
    ["add", "VCS_STAGE_FAILED", (backend: GitBackend) => backend.stage("/corpus/repo", "a.py")],
    ["commit", "VCS_COMMIT_FAILED", (backend: GitBackend) => backend.commit("/corpus/repo", "m", DATE)],
  ] as const)("maps a failing %s to %s", async (method, code, call) => {
    const cause = new Error("fatal: not a git repository");
    gitMockState.repoGit[method].mockRejectedValueOnce(cause);

    await expect(call(new GitBackend())).rejects.toMatchObject({
      code,
      severity: "recoverable",
      cause,
    });
  });

  it("honors a custom timeout", async () => {
    await new GitBackend({ timeoutMs: 5_000 }).init("/corpus/repo");

    expect(gitMockState.simpleGit).toHaveBeenCalledWith({
      baseDir: "/corpus/repo",
      timeout: { block: 5_000 },
    });
  });
});

function makeCommit(index: number, files: string[]): Commit {
  return {
    index,
    timestamp: new Date(DATE.getTime() + index * 3_600_000),
    author: AUTHOR,
    message: index === 0 ? "Initial commit" : `feat: Add part${index}`,
    files,
  };
}

function recordingBackend(failOn?: { method: keyof VcsBackend; call: number }): {
  backend: VcsBackend;
  calls: string[];
} {
  const calls: string[] = [];
  const counts = new Map<string, number>();

  const track = async (method: keyof VcsBackend, detail: string): Promise<void> => {
    const count = (counts.get(method) ?? 0) + 1;
    counts.set(method, count);
    if (failOn && failOn.method === method && failOn.call === count) {
      throw vcsError("VCS_COMMIT_FAILED", `${method} failed`);
    }
    calls.push(`${method} ${detail}`);
  };

  return {
    calls,
    backend: {
      init: (path) => track("init", path),
      setIdentity: (_path, contributor) => track("setIdentity", contributor.email),
      stage: (_path, file) => track("stage", file),
      commit: (_path, message) => track("commit", message),
    },
  };
}

describe("replayHistory", () => {
  const commits = [makeCommit(0, [".gitignore", "README.md"]), makeCommit(1, ["src/app.py"])];

  it("applies every commit in order", async () => {
    const { backend, calls } = recordingBackend();

    await expect(replayHistory(backend, "/corpus/repo", commits)).resolves.toEqual({
      status: "success",
      commitsApplied: 2,
    });
    expect(calls).toEqual([
      "init /corpus/repo",
      "setIdentity dev1@example.com",
      "stage .gitignore",
      "stage README.md",
      "commit Initial commit",
      "setIdentity dev1@example.com",
      "stage src/app.py",
      "commit feat: Add part1",
    ]);
  });

  it("reports partial history when a later commit fails", async () => {
    const { backend } = recordingBackend({ method: "commit", call: 2 });
    const result = await replayHistory(backend, "/corpus/repo", commits);

    expect(result.status).toBe("partial");
    expect(result.commitsApplied).toBe(1);
    expect(result.error?.code).toBe("VCS_COMMIT_FAILED");
  });

  it("reports failure when nothing was committed", async () => {
    const { backend } = recordingBackend({ method: "init", call: 1 });
    const result = await replayHistory(backend, "/corpus/repo", commits);

    expect(result.status).toBe("failed");
    expect(result.commitsApplied).toBe(0);
  });
});
