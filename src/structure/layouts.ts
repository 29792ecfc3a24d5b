import type { Archetype, FileKind, RepoSpec, RoleTag } from "../core/index.js";

/** A fixed value or an inclusive `[min, max]` range drawn per repository/file. */
export type CountRange = number | readonly [number, number];

export interface PinnedLanguage {
  name: string;
  extension: string;
}

export interface FileGroup {
  /** Directory relative to the repository root. */
  dir: string;
  stem: string | ((index: number) => string);
  role: RoleTag;
  count: CountRange;
  lines: CountRange;
  /** Overrides the repository language, e.g. Swift sources in an iOS app. */
  language?: PinnedLanguage;
  kind?: FileKind;
}

export interface ArchetypeLayout {
  directories: string[];
  groups: FileGroup[];
}

const SWIFT: PinnedLanguage = { name: "swift", extension: ".swift" };
const KOTLIN: PinnedLanguage = { name: "kotlin", extension: ".kt" };
const CSHARP: PinnedLanguage = { name: "csharp", extension: ".cs" };
const SQL: PinnedLanguage = { name: "sql", extension: ".sql" };

export const SERVICE_ROTATION = [
  "auth",
  "user",
  "product",
  "order",
  "payment",
  "inventory",
  "notification",
  "analytics",
  "search",
  "recommendation",
] as const;

const indexed =
  (prefix: string) =>
  (index: number): string =>
    `${prefix}${index}`;

export function serviceCountFor(category: string): number {
  if (category.includes("small")) return 10;
  if (category.includes("medium")) return 50;
  return 100;
}

/** `auth`, `user`, … then `auth-1`, `user-1`, … once the rotation wraps. */
export function serviceName(index: number): string {
  const base = SERVICE_ROTATION[index % SERVICE_ROTATION.length];
  const round = Math.floor(index / SERVICE_ROTATION.length);
  return round > 0 ? `${base}-${round}` : base;
}

function serviceGroups(root: string): FileGroup[] {
  return [
    { dir: `${root}/src`, stem: "main", role: "service_main", count: 1, lines: 200 },
    { dir: `${root}/src`, stem: "handlers", role: "handler", count: 1, lines: 300 },
    { dir: `${root}/src`, stem: "models", role: "model", count: 1, lines: 150 },
    { dir: `${root}/src`, stem: "repository", role: "repository", count: 1, lines: 200 },
    { dir: `${root}/tests`, stem: indexed("test"), role: "test", count: [5, 15], lines: [50, 150] },
  ];
}

function webAppLayout(): ArchetypeLayout {
  return {
    directories: [
      "src/components",
      "src/pages",
      "src/utils",
      "src/api",
      "src/models",
      "src/services",
      "tests/unit",
      "tests/integration",
      "tests/e2e",
      "config",
      "public",
      "static",
    ],
    groups: [
      { dir: "src", stem: "app", role: "app_entry", count: 1, lines: 500 },
      { dir: "src", stem: "index", role: "index", count: 1, lines: 50 },
      {
        dir: "src/components",
        stem: indexed("Component"),
        role: "component",
        count: [10, 30],
        lines: [50, 300],
      },
      { dir: "src/pages", stem: indexed("Page"), role: "page", count: [5, 15], lines: [100, 500] },
      { dir: "src/utils", stem: indexed("util"), role: "util", count: [5, 15], lines: [50, 200] },
      { dir: "src/api", stem: indexed("api"), role: "api", count: [5, 15], lines: [100, 300] },
      { dir: "tests/unit", stem: indexed("test"), role: "test", count: [20, 60], lines: [50, 200] },
    ],
  };
}

function serviceMeshLayout(spec: RepoSpec): ArchetypeLayout {
  const roots = ["api-gateway"];
  const count = serviceCountFor(spec.category);
  for (let index = 0; index < count; index += 1) {
    roots.push(`services/${serviceName(index)}`);
  }

  return {
    directories: [
      ...roots.flatMap((root) => [`${root}/src`, `${root}/tests`, `${root}/config`]),
      "shared/models",
      "shared/utils",
      "infrastructure",
    ],
    groups: roots.flatMap(serviceGroups),
  };
}

function cliToolLayout(): ArchetypeLayout {
  return {
    directories: ["cmd", "internal", "pkg", "tests"],
    groups: [
      { dir: "cmd", stem: "main", role: "cli_main", count: 1, lines: 300 },
      { dir: "internal", stem: "commands", role: "command", count: 1, lines: 500 },
      { dir: "internal", stem: "config", role: "config", count: 1, lines: 150 },
      { dir: "pkg", stem: "utils", role: "util", count: 1, lines: 200 },
      { dir: "tests", stem: indexed("test"), role: "test", count: [10, 30], lines: [50, 150] },
    ],
  };
}

function libraryLayout(): ArchetypeLayout {
  return {
    directories: ["src", "tests", "examples", "docs", "benchmarks"],
    groups: [
      { dir: "src", stem: "core", role: "library_core", count: 1, lines: 1000 },
      { dir: "src", stem: indexed("module"), role: "module", count: [10, 30], lines: [100, 500] },
      { dir: "tests", stem: indexed("test"), role: "test", count: [20, 60], lines: [50, 200] },
      {
        dir: "examples",
        stem: indexed("example"),
        role: "example",
        count: [5, 10],
        lines: [50, 150],
      },
    ],
  };
}

function mobileAppLayout(spec: RepoSpec): ArchetypeLayout {
  if (spec.category.includes("ios")) {
    return {
      directories: ["Sources", "Tests", "Resources"],
      groups: [
        {
          dir: "Sources",
          stem: indexed("View"),
          role: "view",
          count: [10, 30],
          lines: [50, 200],
          language: SWIFT,
        },
        {
          dir: "Tests",
          stem: indexed("Test"),
          role: "test",
          count: [10, 20],
          lines: [50, 150],
          language: SWIFT,
        },
      ],
    };
  }

  return {
    directories: ["app/src/main/java", "app/src/test/java", "app/src/main/res"],
    groups: [
      {
        dir: "app/src/main/java/com/example/app",
        stem: indexed("Activity"),
        role: "activity",
        count: [10, 30],
        lines: [50, 200],
        language: KOTLIN,
      },
      {
        dir: "app/src/test/java/com/example/app",
        stem: indexed("Test"),
        role: "test",
        count: [10, 20],
        lines: [50, 150],
        language: KOTLIN,
      },
    ],
  };
}

function gameLayout(): ArchetypeLayout {
  return {
    directories: [
      "Assets/Scripts",
      "Assets/Scenes",
      "Assets/Prefabs",
      "Assets/Materials",
      "Tests",
    ],
    groups: [
      {
        dir: "Assets/Scripts",
        stem: indexed("Script"),
        role: "game_script",
        count: [20, 50],
        lines: [50, 300],
        language: CSHARP,
      },
    ],
  };
}

function dataPipelineLayout(): ArchetypeLayout {
  return {
    directories: ["pipelines", "transformations", "models", "schemas", "tests", "config"],
    groups: [
      {
        dir: "pipelines",
        stem: indexed("pipeline"),
        role: "pipeline",
        count: [5, 15],
        lines: [200, 600],
      },
      {
        dir: "transformations",
        stem: indexed("transform"),
        role: "transform",
        count: [10, 20],
        lines: [100, 300],
      },
    ],
  };
}

function enterpriseAppLayout(): ArchetypeLayout {
  return {
    directories: [
      "backend/src",
      "backend/tests",
      "frontend/src",
      "frontend/tests",
      "database/migrations",
      "docs",
      "infrastructure",
    ],
    groups: [
      {
        dir: "backend/src",
        stem: indexed("module"),
        role: "backend",
        count: [20, 50],
        lines: [100, 500],
      },
      {
        dir: "frontend/src",
        stem: indexed("component"),
        role: "frontend",
        count: [20, 50],
        lines: [100, 400],
      },
      {
        dir: "database/migrations",
        stem: (index) => `migration${String(index).padStart(3, "0")}`,
        role: "migration",
        count: [10, 30],
        lines: 0,
        language: SQL,
        kind: "artifact",
      },
    ],
  };
}

export const LAYOUTS: Record<Archetype, (spec: RepoSpec) => ArchetypeLayout> = {
  "web-app": webAppLayout,
  "service-mesh": serviceMeshLayout,
  "cli-tool": cliToolLayout,
  library: libraryLayout,
  "mobile-app": mobileAppLayout,
  game: gameLayout,
  "data-pipeline": dataPipelineLayout,
  "enterprise-app": enterpriseAppLayout,
};
