import type { LanguageRenderer } from "../types.js";

export const rustRenderer: LanguageRenderer = {
  id: "rust",
  supportsFreeFunctions: true,

  header: (role) => [
    `//! ${role}`,
    "",
    "use chrono::Utc;",
    "use std::collections::HashMap;",
    "",
  ],

  unit: ({ name, faulty }) => [
    `pub struct ${name} {`,
    "    config: HashMap<String, String>,",
    "    initialized: bool,",
    "}",
    "",
    `impl ${name} {`,
    "    pub fn new(config: HashMap<String, String>) -> Self {",
    "        Self { config, initialized: false }",
    "    }",
    "",
    "    pub fn initialize(&mut self) {",
    '        println!("Initializing component");',
    "        self.initialized = true;",
    "    }",
    "",
    "    pub fn process(&self, data: &str) -> Result<HashMap<String, String>, String> {",
    "        if !self.initialized {",
    '            return Err("Component not initialized".to_string());',
    "        }",
    "        self.transform(data)",
    "    }",
    "",
    "    fn transform(&self, data: &str) -> Result<HashMap<String, String>, String> {",
    "        let mut result = HashMap::new();",
    faulty
      ? '        result.insert("data".to_string(), data + 1); // BUG: cannot add integer to &str'
      : '        result.insert("data".to_string(), data.to_string());',
    '        result.insert("timestamp".to_string(), Utc::now().to_rfc3339());',
    "        Ok(result)",
    "    }",
    "}",
    "",
  ],

  freeFunction: (index) => [
    `pub fn function_${index}(param1: &str, param2: i64) -> HashMap<String, String> {`,
    "    let mut result = HashMap::new();",
    '    result.insert("param1".to_string(), param1.to_string());',
    '    result.insert("param2".to_string(), param2.to_string());',
    "    result",
    "}",
    "",
  ],
};
