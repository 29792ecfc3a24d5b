import type { LanguageRenderer, UnitContext } from "../types.js";

const FAULTY_TRANSFORM = "    return data.nonexistent.property; // BUG: Cannot read properties of undefined";

function classBody({ faulty }: UnitContext): string[] {
  return [
    "  async initialize() {",
    '    console.log("Initializing service");',
    "    this.initialized = true;",
    "  }",
    "",
    "  async process(data) {",
    "    if (!this.initialized) {",
    '      throw new Error("Service not initialized");',
    "    }",
    "    return this.transform(data);",
    "  }",
    "",
    "  async transform(data) {",
    faulty ? FAULTY_TRANSFORM : "    return { ...data, processed: true };",
    "  }",
    "}",
    "",
  ];
}

export const javascriptRenderer: LanguageRenderer = {
  id: "javascript",
  supportsFreeFunctions: true,

  header: (role) => [`// ${role}`, '"use strict";', ""],

  unit: (context) => [
    `class ${context.name} {`,
    "  constructor(config) {",
    "    this.config = config;",
    "    this.initialized = false;",
    "  }",
    "",
    ...classBody(context),
  ],

  freeFunction: (index) => [
    `function function${index}(param1, param2 = 0) {`,
    "  return { param1, param2, timestamp: new Date().toISOString() };",
    "}",
    "",
  ],
};

export const typescriptRenderer: LanguageRenderer = {
  id: "typescript",
  supportsFreeFunctions: true,

  header: (role) => [`// ${role}`, 'import type { Component } from "./types";', ""],

  unit: ({ name, faulty }) => [
    `export class ${name} implements Component {`,
    "  private initialized = false;",
    "",
    "  constructor(private readonly config: Record<string, unknown>) {}",
    "",
    "  async initialize(): Promise<void> {",
    '    console.log("Initializing service");',
    "    this.initialized = true;",
    "  }",
    "",
    "  async process(data: Record<string, unknown>): Promise<Record<string, unknown>> {",
    "    if (!this.initialized) {",
    '      throw new Error("Service not initialized");',
    "    }",
    "    return this.transform(data);",
    "  }",
    "",
    "  private async transform(data: Record<string, unknown>): Promise<Record<string, unknown>> {",
    faulty
      ? "    return (data.nonexistent as Record<string, unknown>).property as Record<string, unknown>; // BUG: Cannot read properties of undefined"
      : "    return { ...data, processed: true };",
    "  }",
    "}",
    "",
  ],

  freeFunction: (index) => [
    `export function function${index}(param1: string, param2 = 0): Record<string, unknown> {`,
    "  return { param1, param2, timestamp: new Date().toISOString() };",
    "}",
    "",
  ],
};
