import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";

/**
 * Type guard: returns `true` when `value` is a non-null object
 * (i.e.\ a `Record<string, unknown>`).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/** `repo-{id:05d}-{template}`, the directory name of one generated repository. */
export function formatRepoName(id: number, template: string): string {
  return `repo-${String(id).padStart(5, "0")}-${template}`;
}
