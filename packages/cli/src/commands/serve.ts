/**
 * `wirelet serve` command — run a demo server that greets every client and
 * echoes or relays what it receives.
 */

import { isUtf8 } from "node:buffer";
import {
  WebSocketServer,
  binaryMessage,
  createConsoleLogger,
  textMessage,
} from "@wirelet/server";
import type { ApplicationMessage, Logger, ServerCallbacks } from "@wirelet/server";
import { loadEnv, resolveHost, resolvePort } from "../config.js";
import { printError, printListening, printNotice } from "../output.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type ServeMode = "echo" | "broadcast";

export const SERVE_MODES: readonly ServeMode[] = ["echo", "broadcast"];

export interface ServeCommandOptions {
  port?: string;
  host?: string;
  mode?: string;
  welcome?: string;
  verbose?: boolean;
  /** Override the console logger. */
  logger?: Logger;
  /** Close the server on SIGINT/SIGTERM. Default: true. */
  handleSignals?: boolean;
}

export function parseMode(value: string | undefined): ServeMode {
  const mode = SERVE_MODES.find((m) => m === (value ?? "echo"));
  if (!mode) {
    throw new Error(`Unknown mode "${value}". Use one of: ${SERVE_MODES.join(", ")}`);
  }
  return mode;
}

// ---------------------------------------------------------------------------
// Demo callbacks
// ---------------------------------------------------------------------------

/** Text when the bytes are valid UTF-8, binary otherwise. */
export function toReply(payload: Buffer): ApplicationMessage {
  return isUtf8(payload) ? textMessage(payload.toString("utf-8")) : binaryMessage(payload);
}

export function describePayload(payload: Buffer): string {
  return isUtf8(payload)
    ? `text ${JSON.stringify(payload.toString("utf-8"))}`
    : `binary (${payload.length} bytes)`;
}

export function createDemoCallbacks(mode: ServeMode, welcome: string | undefined, logger: Logger): ServerCallbacks {
  return {
    async onConnect(_server, connection) {
      logger.info(`connection ${connection.id}: connected`);
      if (welcome) {
        await connection.send(welcome);
      }
    },
    async onMessage(server, connection, payload) {
      if (payload === null) {
        logger.info(`connection ${connection.id}: disconnected`);
        return;
      }

      logger.info(`connection ${connection.id}: ${describePayload(payload)}`);
      const reply = toReply(payload);
      if (mode === "echo") {
        await connection.send(reply);
      } else {
        const delivered = await server.broadcast(reply);
        logger.debug(`connection ${connection.id}: relayed to ${delivered} client(s)`);
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Serve command
// ---------------------------------------------------------------------------

/**
 * Execute the `serve` command. Resolves with the running server once it is
 * listening.
 */
export async function serveCommand(options: ServeCommandOptions = {}): Promise<WebSocketServer> {
  const verbose = options.verbose ?? false;
  loadEnv({ verbose });

  const mode = parseMode(options.mode);
  const logger = options.logger ?? createConsoleLogger({ verbose });
  const server = new WebSocketServer({
    port: resolvePort(options.port),
    host: resolveHost(options.host),
    logger,
  });

  const address = await server.serve(createDemoCallbacks(mode, options.welcome, logger));
  printListening({ address: address.address, port: address.port, mode });

  if (options.handleSignals ?? true) {
    const shutdown = (): void => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      printNotice("Shutting down");
      server.close().catch((err: unknown) => {
        printError("Shutdown failed", err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      });
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  }

  return server;
}
