/**
 * Server configuration and defaults.
 */

import { ConfigError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { DEFAULT_RETRY } from "./retry.js";
import type { RetryOptions } from "./retry.js";

export const DEFAULT_PORT = 8001;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_MAX_HANDSHAKE_BYTES = 8 * 1024;
/** Largest inbound payload accepted in a single frame (16 MiB). */
export const DEFAULT_MAX_PAYLOAD_LENGTH = 16 * 1024 * 1024;

export interface WebSocketServerConfig {
  /** Port to listen on. Default: 8001. Use 0 for an ephemeral port. */
  port?: number;
  /** Host to bind to. Default: "0.0.0.0". */
  host?: string;
  /** Give up on a handshake whose request header exceeds this many bytes. Default: 8192. */
  maxHandshakeBytes?: number;
  /** Close a session whose next frame declares a larger payload. Default: 16 MiB. */
  maxPayloadLength?: number;
  /** Backoff for transient socket read errors. */
  readRetry?: RetryOptions;
  /** Where diagnostics go. Default: a console logger with the "[wirelet]" prefix. */
  logger?: Logger;
}

export type ResolvedServerConfig = Required<Omit<WebSocketServerConfig, "readRetry">> & {
  readRetry: Required<RetryOptions>;
};

function requireInteger(option: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(option, `${option} must be an integer between ${min} and ${max}, got ${value}`);
  }
  return value;
}

/**
 * Fill in defaults and validate ranges. Throws {@link ConfigError}.
 */
export function resolveServerConfig(config: WebSocketServerConfig = {}): ResolvedServerConfig {
  const readRetry = config.readRetry ?? {};

  return {
    port: requireInteger("port", config.port ?? DEFAULT_PORT, 0, 65535),
    host: config.host ?? DEFAULT_HOST,
    maxHandshakeBytes: requireInteger("maxHandshakeBytes", config.maxHandshakeBytes ?? DEFAULT_MAX_HANDSHAKE_BYTES, 16),
    maxPayloadLength: requireInteger("maxPayloadLength", config.maxPayloadLength ?? DEFAULT_MAX_PAYLOAD_LENGTH, 1),
    readRetry: {
      maxRetries: requireInteger("readRetry.maxRetries", readRetry.maxRetries ?? DEFAULT_RETRY.maxRetries, 0),
      initialDelayMs: requireInteger(
        "readRetry.initialDelayMs",
        readRetry.initialDelayMs ?? DEFAULT_RETRY.initialDelayMs,
        0,
      ),
      maxDelayMs: requireInteger("readRetry.maxDelayMs", readRetry.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs, 0),
      backoffMultiplier: readRetry.backoffMultiplier ?? DEFAULT_RETRY.backoffMultiplier,
    },
    logger: config.logger ?? createConsoleLogger(),
  };
}
