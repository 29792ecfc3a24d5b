import type { LanguageRenderer } from "../types.js";

export const csharpRenderer: LanguageRenderer = {
  id: "csharp",
  supportsFreeFunctions: false,

  header: (role) => [
    "using System;",
    "using System.Collections.Generic;",
    "",
    `// ${role}`,
    "namespace Example.App;",
    "",
  ],

  unit: ({ name, faulty }) => [
    `public class ${name}`,
    "{",
    "    private readonly IDictionary<string, object> _config;",
    "    private bool _initialized;",
    "",
    `    public ${name}(IDictionary<string, object> config)`,
    "    {",
    "        _config = config;",
    "    }",
    "",
    "    public void Initialize()",
    "    {",
    '        Console.WriteLine("Initializing component");',
    "        _initialized = true;",
    "    }",
    "",
    "    public IDictionary<string, object> Process(object data)",
    "    {",
    "        if (!_initialized)",
    "        {",
    '            throw new InvalidOperationException("Component not initialized");',
    "        }",
    "        return Transform(data);",
    "    }",
    "",
    "    private IDictionary<string, object> Transform(object data)",
    "    {",
    faulty
      ? "        return (Dictionary<string, object>)data; // BUG: InvalidCastException"
      : '        return new Dictionary<string, object> { ["data"] = data, ["timestamp"] = DateTime.UtcNow };',
    "    }",
    "}",
    "",
  ],
};
