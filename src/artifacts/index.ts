export {
  BOOTSTRAP_FILES,
  TOOLCHAINS,
  artifactEntries,
  resolveTemplate,
  toolchainFor,
} from "./catalog.js";
export type { Toolchain } from "./catalog.js";
export { ArtifactRenderer, DEFAULT_TEMPLATES_DIR } from "./renderer.js";
export type { ArtifactContext } from "./renderer.js";
