import type { SynthError } from "./errors.js";

export interface Contributor {
  name: string;
  email: string;
}

export interface CategoryDefinition {
  name: string;
  count: number;
  templates: string[];
}

export interface LanguageDefinition {
  name: string;
  weight: number;
  extensions: string[];
}

/** One quota position: the `ordinal`-th repository of `category`. */
export interface QuotaSlot {
  category: string;
  template: string;
  ordinal: number;
}

export interface RepoSpec {
  readonly id: number;
  readonly name: string;
  readonly category: string;
  readonly template: string;
  readonly language: string;
  readonly targetLines: number;
  readonly targetCommits: number;
  readonly contributorCount: number;
  readonly contributors: readonly Contributor[];
}

export const ARCHETYPES = [
  "web-app",
  "service-mesh",
  "cli-tool",
  "library",
  "mobile-app",
  "game",
  "data-pipeline",
  "enterprise-app",
] as const;

export type Archetype = (typeof ARCHETYPES)[number];

export type RoleTag =
  | "app_entry"
  | "index"
  | "component"
  | "page"
  | "util"
  | "api"
  | "test"
  | "service_main"
  | "handler"
  | "model"
  | "repository"
  | "cli_main"
  | "command"
  | "config"
  | "library_core"
  | "module"
  | "example"
  | "view"
  | "activity"
  | "game_script"
  | "pipeline"
  | "transform"
  | "backend"
  | "frontend"
  | "migration"
  | "artifact";

export type FileKind = "source" | "artifact";

export interface FileManifestEntry {
  /** Repository-relative POSIX path. */
  path: string;
  role: RoleTag;
  targetLines: number;
  language: string;
  kind: FileKind;
}

export type FileManifest = FileManifestEntry[];

export interface StructureResult {
  archetype: Archetype;
  directories: string[];
  manifest: FileManifest;
}

export interface Commit {
  index: number;
  timestamp: Date;
  author: Contributor;
  message: string;
  files: string[];
}

export type RepoOutcomeStatus = "success" | "partial" | "failed" | "skipped";

export interface GeneratedRepository {
  spec: RepoSpec;
  path: string;
  archetype?: Archetype;
  manifest: FileManifest;
  commits: Commit[];
  status: RepoOutcomeStatus;
  commitsApplied: number;
  faultsInjected: number;
  durationMs: number;
  error?: SynthError;
}

export interface RunFailure {
  index: number;
  name: string;
  code: string;
  message: string;
}

export interface RunSummary {
  seed: string;
  outputDir: string;
  startIndex: number;
  nextIndex: number;
  targetCount: number;
  generated: number;
  partial: number;
  failed: number;
  skipped: number;
  totalCommits: number;
  totalFiles: number;
  failures: RunFailure[];
  durationMs: number;
}
