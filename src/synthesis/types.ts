export interface SynthesisRequest {
  language: string;
  role: string;
  lines: number;
}

export interface UnitContext {
  /** Position of the unit within the file. */
  index: number;
  /** PascalCase unit name, e.g. `Handler3`. */
  name: string;
  role: string;
  /** Render the transform step as a defective statement. */
  faulty: boolean;
}

/**
 * Per-language skeleton. A file is `header`, one `unit` per unit count, one
 * `freeFunction` per function count (when supported), then `footer`.
 */
export interface LanguageRenderer {
  readonly id: string;
  readonly supportsFreeFunctions: boolean;
  header(role: string): string[];
  unit(context: UnitContext): string[];
  freeFunction?(index: number, role: string): string[];
  footer?(): string[];
}

/** Comment text carried by every injected fault. */
export const FAULT_MARKER = "BUG:";
