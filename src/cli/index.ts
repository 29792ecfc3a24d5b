#!/usr/bin/env node

import { isConfigError } from "../core/index.js";
import { runCli } from "./cli.js";

export const EXIT_GENERAL_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;

runCli().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = isConfigError(error) ? EXIT_CONFIG_ERROR : EXIT_GENERAL_ERROR;
});
