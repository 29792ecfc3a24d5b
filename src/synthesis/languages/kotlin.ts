import type { LanguageRenderer } from "../types.js";

export const kotlinRenderer: LanguageRenderer = {
  id: "kotlin",
  supportsFreeFunctions: true,

  header: (role) => ["package com.example.app", "", "import java.time.Instant", "", `// ${role}`, ""],

  unit: ({ name, faulty }) => [
    `class ${name}(private val config: Map<String, Any>) {`,
    "    private var initialized = false",
    "",
    "    fun initialize() {",
    '        println("Initializing component")',
    "        initialized = true",
    "    }",
    "",
    "    fun process(data: Any): Map<String, Any> {",
    '        check(initialized) { "Component not initialized" }',
    "        return transform(data)",
    "    }",
    "",
    "    @Suppress(\"UNCHECKED_CAST\")",
    "    private fun transform(data: Any): Map<String, Any> =",
    faulty
      ? "        data as Map<String, Any> // BUG: ClassCastException"
      : '        mapOf("data" to data, "timestamp" to Instant.now())',
    "}",
    "",
  ],

  freeFunction: (index) => [
    `fun function${index}(param1: String, param2: Int = 0): Map<String, Any> =`,
    '    mapOf("param1" to param1, "param2" to param2, "timestamp" to Instant.now())',
    "",
  ],
};
