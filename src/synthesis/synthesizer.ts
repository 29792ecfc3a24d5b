import type { Rng } from "../core/index.js";
import { rendererRegistry, type RendererRegistry } from "./registry.js";
import type { LanguageRenderer, SynthesisRequest } from "./types.js";

export interface SynthesisOptions {
  faultInjection: { enabled: boolean; probability: number };
  registry?: RendererRegistry;
}

export interface SynthesisResult {
  text: string;
  unitCount: number;
  functionCount: number;
  faultsInjected: number;
  /** True when no renderer exists for the language. */
  placeholder: boolean;
}

const LINES_PER_UNIT = 50;
const LINES_PER_FUNCTION = 30;

export function unitCountFor(lines: number): number {
  return Math.max(1, Math.floor(lines / LINES_PER_UNIT));
}

export function functionCountFor(lines: number, renderer: LanguageRenderer): number {
  return renderer.supportsFreeFunctions ? Math.max(1, Math.floor(lines / LINES_PER_FUNCTION)) : 0;
}

/** `service_main` -> `ServiceMain`. */
export function unitBaseName(role: string): string {
  const name = role
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join("");
  return name.length > 0 ? name : "Component";
}

export function renderPlaceholder(lines: number): string {
  const output: string[] = [];
  for (let index = 0; index < lines; index += 1) {
    output.push(`// Line ${index}`);
  }
  return output.length > 0 ? `${output.join("\n")}\n` : "";
}

/**
 * Produce skeleton source for one file. The line budget sets the unit and
 * function counts; it is not an exact length.
 */
export function synthesizeCode(
  request: SynthesisRequest,
  rng: Rng,
  options: SynthesisOptions,
): SynthesisResult {
  const renderer = (options.registry ?? rendererRegistry).get(request.language);
  if (!renderer) {
    return {
      text: renderPlaceholder(request.lines),
      unitCount: 0,
      functionCount: 0,
      faultsInjected: 0,
      placeholder: true,
    };
  }

  const unitCount = unitCountFor(request.lines);
  const functionCount = functionCountFor(request.lines, renderer);
  const baseName = unitBaseName(request.role);
  const { enabled, probability } = options.faultInjection;

  const output = [...renderer.header(request.role)];
  let faultsInjected = 0;

  for (let index = 0; index < unitCount; index += 1) {
    const faulty = enabled && rng.chance(probability);
    if (faulty) faultsInjected += 1;
    output.push(
      ...renderer.unit({ index, name: `${baseName}${index}`, role: request.role, faulty }),
    );
  }

  if (renderer.freeFunction) {
    for (let index = 0; index < functionCount; index += 1) {
      output.push(...renderer.freeFunction(index, request.role));
    }
  }

  output.push(...(renderer.footer?.() ?? []));

  return {
    text: `${output.join("\n")}\n`,
    unitCount,
    functionCount,
    faultsInjected,
    placeholder: false,
  };
}
