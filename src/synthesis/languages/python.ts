import type { LanguageRenderer, UnitContext } from "../types.js";

export const pythonRenderer: LanguageRenderer = {
  id: "python",
  supportsFreeFunctions: true,

  header: (role) => [
    '"""',
    `Module for ${role}`,
    '"""',
    "",
    "import logging",
    "import typing",
    "from datetime import datetime",
    "",
    "logger = logging.getLogger(__name__)",
    "",
  ],

  unit: ({ name, faulty }: UnitContext) => [
    `class ${name}:`,
    `    """${name} component"""`,
    "",
    "    def __init__(self, config: dict):",
    "        self.config = config",
    "        self.initialized = False",
    "",
    "    def initialize(self):",
    '        """Initialize component"""',
    '        logger.info("Initializing %s", type(self).__name__)',
    "        self.initialized = True",
    "",
    "    def process(self, data: typing.Any) -> typing.Any:",
    '        """Process data"""',
    "        if not self.initialized:",
    '            raise RuntimeError("Component not initialized")',
    "        return self._transform(data)",
    "",
    "    def _transform(self, data: typing.Any) -> typing.Any:",
    faulty ? "        return data + None  # BUG: TypeError" : "        return data",
    "",
  ],

  freeFunction: (index) => [
    `def function_${index}(param1: str, param2: int = 0) -> dict:`,
    `    """Function ${index}"""`,
    "    return {",
    '        "param1": param1,',
    '        "param2": param2,',
    '        "timestamp": datetime.now().isoformat(),',
    "    }",
    "",
  ],
};
