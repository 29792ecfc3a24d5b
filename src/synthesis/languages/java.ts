import type { LanguageRenderer } from "../types.js";

export const javaRenderer: LanguageRenderer = {
  id: "java",
  supportsFreeFunctions: false,

  header: (role) => [
    "package com.example.app;",
    "",
    "import java.time.LocalDateTime;",
    "import java.util.HashMap;",
    "import java.util.Map;",
    "",
    `// ${role}`,
  ],

  // Only the first class may be public in a Java compilation unit.
  unit: ({ index, name, faulty }) => [
    `${index === 0 ? "public " : ""}class ${name} {`,
    "    private final Map<String, Object> config;",
    "    private boolean initialized;",
    "",
    `    ${index === 0 ? "public " : ""}${name}(Map<String, Object> config) {`,
    "        this.config = config;",
    "        this.initialized = false;",
    "    }",
    "",
    "    public void initialize() {",
    '        System.out.println("Initializing component");',
    "        this.initialized = true;",
    "    }",
    "",
    "    public Map<String, Object> process(Object data) {",
    "        if (!initialized) {",
    '            throw new IllegalStateException("Component not initialized");',
    "        }",
    "        return transform(data);",
    "    }",
    "",
    "    @SuppressWarnings(\"unchecked\")",
    "    private Map<String, Object> transform(Object data) {",
    ...(faulty
      ? ["        return (Map<String, Object>) data; // BUG: ClassCastException"]
      : [
          "        Map<String, Object> result = new HashMap<>();",
          '        result.put("data", data);',
          '        result.put("timestamp", LocalDateTime.now());',
          "        return result;",
        ]),
    "    }",
    "}",
    "",
  ],
};
