#!/usr/bin/env node
/**
 * Executable entry point for the `wirelet` command.
 */

import { createProgram } from "./cli.js";
import { printError } from "./output.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    printError(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
