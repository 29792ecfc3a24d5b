/**
 * Variables git needs to find itself, the user's config and a temp dir.
 * Anything else is left out: simple-git refuses to spawn when the child env
 * carries editor, pager, askpass or ssh overrides, and npm sets `EDITOR` for
 * every script it runs.
 */
const PASSTHROUGH_VARS = new Set([
  "PATH",
  "PATHEXT",
  "HOME",
  "USER",
  "USERPROFILE",
  "APPDATA",
  "SYSTEMROOT",
  "COMSPEC",
  "TMPDIR",
  "TEMP",
  "TMP",
  "XDG_CONFIG_HOME",
  "LANG",
  "LANGUAGE",
]);

function passesThrough(name: string): boolean {
  const upper = name.toUpperCase();
  return PASSTHROUGH_VARS.has(upper) || upper.startsWith("LC_");
}

/** Child environment for a git call: the allowlisted parent vars, prompts off, then `extra`. */
export function buildGitEnv(
  extra: Record<string, string> = {},
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined && passesThrough(name)) {
      env[name] = value;
    }
  }
  return { ...env, GIT_TERMINAL_PROMPT: "0", ...extra };
}
