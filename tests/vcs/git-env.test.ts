import { describe, expect, it } from "vitest";

import { buildGitEnv } from "../../src/vcs/git-env.js";

describe("buildGitEnv", () => {
  const parent = {
    PATH: "/usr/local/bin:/usr/bin",
    HOME: "/home/dev",
    LANG: "en_US.UTF-8",
    LC_ALL: "C",
    EDITOR: "vi",
    GIT_EDITOR: "vim",
    GIT_ASKPASS: "/usr/bin/askpass",
    PAGER: "less",
    GIT_SSH_COMMAND: "ssh -i key",
    npm_lifecycle_event: "start",
    UNSET: undefined,
  };

  it("keeps only what git needs and turns prompts off", () => {
    expect(buildGitEnv({}, parent)).toEqual({
      PATH: "/usr/local/bin:/usr/bin",
      HOME: "/home/dev",
      LANG: "en_US.UTF-8",
      LC_ALL: "C",
      GIT_TERMINAL_PROMPT: "0",
    });
  });

  it("layers per-call overrides on top", () => {
    const env = buildGitEnv({ GIT_AUTHOR_DATE: "@1 +0000", GIT_TERMINAL_PROMPT: "1" }, parent);

    expect(env.GIT_AUTHOR_DATE).toBe("@1 +0000");
    expect(env.GIT_TERMINAL_PROMPT).toBe("1");
  });

  it("matches Windows-style casing", () => {
    expect(buildGitEnv({}, { Path: "C:\\Windows", SystemRoot: "C:\\Windows" })).toEqual({
      Path: "C:\\Windows",
      SystemRoot: "C:\\Windows",
      GIT_TERMINAL_PROMPT: "0",
    });
  });
});
