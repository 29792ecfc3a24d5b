import type { LanguageRenderer } from "../types.js";

export const swiftRenderer: LanguageRenderer = {
  id: "swift",
  supportsFreeFunctions: true,

  header: (role) => ["import Foundation", "", `// ${role}`, ""],

  unit: ({ name, faulty }) => [
    `final class ${name} {`,
    "    private let config: [String: Any]",
    "    private var initialized = false",
    "",
    "    init(config: [String: Any]) {",
    "        self.config = config",
    "    }",
    "",
    "    func initialize() {",
    '        print("Initializing component")',
    "        initialized = true",
    "    }",
    "",
    "    func process(_ data: Any) throws -> [String: Any] {",
    "        guard initialized else {",
    '            throw NSError(domain: "Component", code: 1, userInfo: [NSLocalizedDescriptionKey: "Component not initialized"])',
    "        }",
    "        return transform(data)",
    "    }",
    "",
    "    private func transform(_ data: Any) -> [String: Any] {",
    faulty
      ? "        return data as! [String: Any] // BUG: crashes when data is not a dictionary"
      : '        return ["data": data, "timestamp": Date()]',
    "    }",
    "}",
    "",
  ],

  freeFunction: (index) => [
    `func function${index}(_ param1: String, _ param2: Int = 0) -> [String: Any] {`,
    '    return ["param1": param1, "param2": param2, "timestamp": Date()]',
    "}",
    "",
  ],
};
