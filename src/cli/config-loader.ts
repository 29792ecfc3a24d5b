import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { type SynthConfig, isRecord, loadConfig, pathExists } from "../core/index.js";

const DEFINE_CONFIG_IMPORT = /["']repo-synth["']/;
const DEFINE_CONFIG_IMPORT_LINE =
  /^\s*import\s*\{\s*defineConfig\s*\}\s*from\s*["']repo-synth["'];\s*$/m;
const DEFINE_CONFIG_EXPORT = /export\s+default\s+defineConfig\s*\(/;

export interface ConfigLoaderOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  onWarning?: (message: string) => void;
}

/**
 * Load `reposynth.config.{ts,js,mjs}` when present. A file that cannot be
 * imported is reported through `onWarning`; one that imports but fails
 * validation throws `CONFIG_INVALID`.
 */
export async function loadOptionalConfigFile(
  configPath: string,
  options: ConfigLoaderOptions = {},
): Promise<SynthConfig | null> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);
  if (!(await pathExists(absolutePath))) {
    return null;
  }

  let candidate: unknown;
  try {
    candidate = await importConfigCandidate(absolutePath);
  } catch (error) {
    options.onWarning?.(
      `Failed to load config at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }

  return loadConfig(candidate, { env: options.env });
}

async function importConfigCandidate(absolutePath: string): Promise<unknown> {
  try {
    return await importCandidate(`${pathToFileURL(absolutePath).href}?t=${Date.now()}`);
  } catch (error) {
    const fallbackCandidate = await importDefineConfigFallback(absolutePath, error);
    if (fallbackCandidate !== null) {
      return fallbackCandidate;
    }

    throw error;
  }
}

/**
 * Node 20 cannot import `.ts` files. A config that only wraps an object
 * literal in `defineConfig` is plain JavaScript once that wrapper is gone.
 */
async function importDefineConfigFallback(
  absolutePath: string,
  error: unknown,
): Promise<unknown | null> {
  if (!shouldTryDefineConfigFallback(error)) {
    return null;
  }

  const source = await readFile(absolutePath, "utf8");
  const transformed = stripDefineConfig(source);
  if (transformed === null) {
    return null;
  }

  const encodedSource = Buffer.from(transformed, "utf8").toString("base64");
  return await importCandidate(`data:text/javascript;base64,${encodedSource}`);
}

function shouldTryDefineConfigFallback(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (isRecord(error) && error.code === "ERR_UNKNOWN_FILE_EXTENSION") {
    return true;
  }

  return DEFINE_CONFIG_IMPORT.test(error.message);
}

export function stripDefineConfig(source: string): string | null {
  if (!DEFINE_CONFIG_IMPORT_LINE.test(source) || !DEFINE_CONFIG_EXPORT.test(source)) {
    return null;
  }

  return source
    .replace(DEFINE_CONFIG_IMPORT_LINE, "")
    .replace(DEFINE_CONFIG_EXPORT, "export default (");
}

async function importCandidate(moduleSpecifier: string): Promise<unknown> {
  const imported: unknown = await import(moduleSpecifier);
  if (!isRecord(imported)) {
    return imported;
  }
  return imported.default ?? imported.config ?? imported;
}
