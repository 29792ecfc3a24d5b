import type { Archetype, FileManifestEntry } from "../core/index.js";
import { hasInfrastructure } from "../structure/archetype.js";

/** Baseline files staged by the bootstrap commit, in staging order. */
export const BOOTSTRAP_FILES = [".gitignore", "README.md"] as const;

export interface Toolchain {
  label: string;
  installCommand: string;
  testCommand: string;
  buildCommand: string;
  /** Dependency manifest files and the templates they render from. */
  manifests: ReadonlyArray<{ path: string; template: string }>;
}

const NODE_TOOLCHAIN: Toolchain = {
  label: "JavaScript",
  installCommand: "npm install",
  testCommand: "npm test",
  buildCommand: "npm run build",
  manifests: [{ path: "package.json", template: "package.json.tmpl" }],
};

export const TOOLCHAINS: Readonly<Record<string, Toolchain>> = {
  python: {
    label: "Python",
    installCommand: "pip install -r requirements.txt",
    testCommand: "pytest",
    buildCommand: "python -m compileall .",
    manifests: [
      { path: "setup.py", template: "setup.py.tmpl" },
      { path: "requirements.txt", template: "requirements.txt.tmpl" },
    ],
  },
  javascript: NODE_TOOLCHAIN,
  typescript: { ...NODE_TOOLCHAIN, label: "TypeScript" },
  java: {
    label: "Java",
    installCommand: "mvn -B install -DskipTests",
    testCommand: "mvn -B test",
    buildCommand: "mvn -B package",
    manifests: [{ path: "pom.xml", template: "pom.xml.tmpl" }],
  },
  go: {
    label: "Go",
    installCommand: "go mod download",
    testCommand: "go test ./...",
    buildCommand: "go build ./...",
    manifests: [{ path: "go.mod", template: "go.mod.tmpl" }],
  },
  rust: {
    label: "Rust",
    installCommand: "cargo fetch",
    testCommand: "cargo test",
    buildCommand: "cargo build --release",
    manifests: [{ path: "Cargo.toml", template: "Cargo.toml.tmpl" }],
  },
  ruby: {
    label: "Ruby",
    installCommand: "bundle install",
    testCommand: "bundle exec rspec",
    buildCommand: "bundle exec rake build",
    manifests: [{ path: "Gemfile", template: "Gemfile.tmpl" }],
  },
  php: {
    label: "PHP",
    installCommand: "composer install",
    testCommand: "composer test",
    buildCommand: "composer dump-autoload --optimize",
    manifests: [{ path: "composer.json", template: "composer.json.tmpl" }],
  },
  csharp: {
    label: "C#",
    installCommand: "dotnet restore",
    testCommand: "dotnet test",
    buildCommand: "dotnet build",
    manifests: [{ path: "App.csproj", template: "App.csproj.tmpl" }],
  },
};

const FALLBACK_TOOLCHAIN: Toolchain = { ...NODE_TOOLCHAIN, label: "mixed languages", manifests: [] };

export function toolchainFor(language: string): Toolchain {
  return TOOLCHAINS[language] ?? FALLBACK_TOOLCHAIN;
}

const INFRASTRUCTURE_TEMPLATES: ReadonlyArray<{ path: string; template: string }> = [
  { path: "docker-compose.yml", template: "docker-compose.yml.tmpl" },
  { path: "infrastructure/k8s/deployment.yaml", template: "k8s-deployment.yaml.tmpl" },
  { path: "infrastructure/k8s/service.yaml", template: "k8s-service.yaml.tmpl" },
  { path: "infrastructure/terraform/main.tf", template: "main.tf.tmpl" },
];

const COMMON_TEMPLATES: ReadonlyArray<{ path: string; template: string }> = [
  { path: ".gitignore", template: "gitignore.tmpl" },
  { path: "README.md", template: "README.md.tmpl" },
  { path: "LICENSE", template: "LICENSE.tmpl" },
  { path: ".github/workflows/ci.yml", template: "ci.yml.tmpl" },
];

function dockerfileTemplate(language: string): string {
  return language === "python" ? "Dockerfile.python.tmpl" : "Dockerfile.node.tmpl";
}

function templatesFor(
  language: string,
  archetype: Archetype,
): Array<{ path: string; template: string }> {
  const templates = [...COMMON_TEMPLATES, ...toolchainFor(language).manifests];
  if (hasInfrastructure(archetype)) {
    templates.push({ path: "Dockerfile", template: dockerfileTemplate(language) });
    templates.push(...INFRASTRUCTURE_TEMPLATES);
  }
  return templates;
}

/** Boilerplate entries appended after a repository's source files. */
export function artifactEntries(language: string, archetype: Archetype): FileManifestEntry[] {
  return templatesFor(language, archetype).map(({ path }) => ({
    path,
    role: "artifact",
    targetLines: 0,
    language,
    kind: "artifact",
  }));
}

/** Template file for an artifact entry, or `undefined` when none is known. */
export function resolveTemplate(
  entry: Pick<FileManifestEntry, "path" | "role">,
  language: string,
  archetype: Archetype,
): string | undefined {
  if (entry.role === "migration") {
    return "migration.sql.tmpl";
  }

  return templatesFor(language, archetype).find((candidate) => candidate.path === entry.path)
    ?.template;
}
