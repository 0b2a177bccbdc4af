/**
 * Configuration loading for the wirelet CLI.
 *
 * Loads a .env file, then resolves listen options from flags with
 * `WIRELET_*` environment variables as fallbacks.
 */

import { resolve } from "node:path";
import { existsSync } from "node:fs";
import * as dotenv from "dotenv";
import { ConfigError, DEFAULT_HOST, DEFAULT_PORT } from "@wirelet/server";
import { printDebug } from "./output.js";

export type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// .env loading
// ---------------------------------------------------------------------------

export interface LoadEnvOptions {
  /** Directory holding the .env file. Default: the working directory. */
  cwd?: string;
  verbose?: boolean;
}

/**
 * Load environment variables from a .env file. Variables already set in the
 * environment win. Returns whether a file was loaded.
 */
export function loadEnv(options: LoadEnvOptions = {}): boolean {
  const { cwd = process.cwd(), verbose = false } = options;
  const envPath = resolve(cwd, ".env");
  if (!existsSync(envPath)) {
    printDebug("No .env file found", verbose);
    return false;
  }

  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigError("env", `Failed to load ${envPath}: ${result.error.message}`);
  }
  printDebug(`Loaded .env from ${envPath}`, verbose);
  return true;
}

// ---------------------------------------------------------------------------
// Listen options
// ---------------------------------------------------------------------------

/**
 * Port from the `--port` flag, then `WIRELET_PORT`, then the server default.
 * Range checks are left to the server config.
 */
export function resolvePort(flag: string | undefined, env: Env = process.env): number {
  const raw = flag ?? env.WIRELET_PORT;
  if (raw === undefined || raw.trim() === "") return DEFAULT_PORT;

  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new ConfigError("port", `Invalid port "${raw}"`);
  }
  return Number(value);
}

/** Host from the `--host` flag, then `WIRELET_HOST`, then the server default. */
export function resolveHost(flag: string | undefined, env: Env = process.env): string {
  const value = flag ?? env.WIRELET_HOST;
  return value === undefined || value.trim() === "" ? DEFAULT_HOST : value.trim();
}
