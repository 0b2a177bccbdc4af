/**
 * Command definitions for the wirelet CLI.
 */

import { Command } from "commander";
import { serveCommand, SERVE_MODES } from "./commands/serve.js";
import { acceptKeyCommand } from "./commands/accept-key.js";

type ServeFlags = {
  verbose?: boolean;
  port?: string;
  host?: string;
  mode?: string;
  welcome?: string;
};

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

export function createProgram(): Command {
  const program = new Command();

  program
    .name("wirelet")
    .description("Minimal WebSocket server")
    .version("0.1.0")
    .option("-v, --verbose", "Enable verbose/debug output");

  // --- serve command ---
  program
    .command("serve")
    .description("Run a demo server that greets clients and echoes or relays messages")
    .option("-p, --port <port>", "Port to listen on (env: WIRELET_PORT, default 8001)")
    .option("-H, --host <host>", "Host to bind (env: WIRELET_HOST, default 0.0.0.0)")
    .option("--mode <mode>", `Reply mode: ${SERVE_MODES.join(" | ")}`, "echo")
    .option("-w, --welcome <text>", "Text frame sent to each client on connect", "Welcome!")
    .action(async (_cmdOpts: ServeFlags, cmd: Command) => {
      const flags = cmd.optsWithGlobals<ServeFlags>();
      await serveCommand({
        port: flags.port,
        host: flags.host,
        mode: flags.mode,
        welcome: flags.welcome,
        verbose: flags.verbose,
      });
    });

  // --- accept-key command ---
  program
    .command("accept-key")
    .description("Print the Sec-WebSocket-Accept token for a client key")
    .argument("<key>", "Value of the client's Sec-WebSocket-Key header")
    .action((key: string) => {
      acceptKeyCommand(key);
    });

  return program;
}
