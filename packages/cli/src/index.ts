/**
 * @wirelet/cli — command-line front end for @wirelet/server.
 *
 * @packageDocumentation
 */

// --- Configuration ---
export { loadEnv, resolvePort, resolveHost } from "./config.js";
export type { Env, LoadEnvOptions } from "./config.js";

// --- Output formatting ---
export { colorEnabled, printListening, printNotice, printError, printDebug } from "./output.js";
export type { ListeningInfo } from "./output.js";

// --- Commands ---
export {
  serveCommand,
  parseMode,
  toReply,
  describePayload,
  createDemoCallbacks,
  SERVE_MODES,
} from "./commands/serve.js";
export type { ServeMode, ServeCommandOptions } from "./commands/serve.js";
export { acceptKeyCommand } from "./commands/accept-key.js";

// --- CLI program ---
export { createProgram } from "./cli.js";
