import { csharpRenderer } from "./languages/csharp.js";
import { goRenderer } from "./languages/go.js";
import { javaRenderer } from "./languages/java.js";
import { javascriptRenderer, typescriptRenderer } from "./languages/javascript.js";
import { kotlinRenderer } from "./languages/kotlin.js";
import { pythonRenderer } from "./languages/python.js";
import { rustRenderer } from "./languages/rust.js";
import { swiftRenderer } from "./languages/swift.js";
import type { LanguageRenderer } from "./types.js";

/**
 * Language renderers keyed by language name. Languages with no renderer fall
 * back to placeholder output in the synthesizer.
 */
export class RendererRegistry {
  private readonly renderers = new Map<string, LanguageRenderer>();

  private readonly aliases = new Map<string, string>([
    ["py", "python"],
    ["js", "javascript"],
    ["ts", "typescript"],
    ["kt", "kotlin"],
    ["cs", "csharp"],
    ["c#", "csharp"],
  ]);

  /** Replaces any previous renderer registered under the same ID. */
  register(renderer: LanguageRenderer): void {
    this.renderers.set(renderer.id, renderer);
  }

  alias(alias: string, canonicalId: string): void {
    this.aliases.set(alias, canonicalId);
  }

  get(language: string): LanguageRenderer | undefined {
    const id = language.toLowerCase();
    return this.renderers.get(this.aliases.get(id) ?? id);
  }

  registeredIds(): string[] {
    return [...this.renderers.keys()];
  }
}

export function createDefaultRegistry(): RendererRegistry {
  const registry = new RendererRegistry();
  for (const renderer of [
    pythonRenderer,
    javascriptRenderer,
    typescriptRenderer,
    javaRenderer,
    goRenderer,
    rustRenderer,
    csharpRenderer,
    kotlinRenderer,
    swiftRenderer,
  ]) {
    registry.register(renderer);
  }
  return registry;
}

export const rendererRegistry = createDefaultRegistry();
