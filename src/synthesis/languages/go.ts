import type { LanguageRenderer } from "../types.js";

export const goRenderer: LanguageRenderer = {
  id: "go",
  supportsFreeFunctions: true,

  header: (role) => [
    `// Package main holds the ${role} implementation.`,
    "package main",
    "",
    "import (",
    '\t"fmt"',
    '\t"time"',
    ")",
    "",
  ],

  unit: ({ name, faulty }) => [
    `type ${name} struct {`,
    "\tConfig      map[string]interface{}",
    "\tInitialized bool",
    "}",
    "",
    `func New${name}(config map[string]interface{}) *${name} {`,
    `\treturn &${name}{Config: config}`,
    "}",
    "",
    `func (c *${name}) Initialize() {`,
    '\tfmt.Println("Initializing component")',
    "\tc.Initialized = true",
    "}",
    "",
    `func (c *${name}) Process(data interface{}) (map[string]interface{}, error) {`,
    "\tif !c.Initialized {",
    '\t\treturn nil, fmt.Errorf("component not initialized")',
    "\t}",
    "\treturn c.transform(data)",
    "}",
    "",
    `func (c *${name}) transform(data interface{}) (map[string]interface{}, error) {`,
    ...(faulty
      ? [
          "\tvar result map[string]interface{}",
          '\tresult["data"] = data // BUG: assignment to entry in nil map',
        ]
      : ['\tresult := map[string]interface{}{"data": data, "timestamp": time.Now()}']),
    "\treturn result, nil",
    "}",
    "",
  ],

  freeFunction: (index) => [
    `func Function${index}(param1 string, param2 int) map[string]interface{} {`,
    '\treturn map[string]interface{}{"param1": param1, "param2": param2, "timestamp": time.Now()}',
    "}",
    "",
  ],
};
