/**
 * @wirelet/server — a small WebSocket server.
 *
 * Handles the HTTP upgrade handshake, keeps a locked registry of live
 * clients, and encodes/decodes single unfragmented frames, including a
 * compact "delta" payload for pushing incremental key/value updates.
 *
 * @packageDocumentation
 */

// --- Server ---
export { WebSocketServer } from "./server.js";
export type { ServerCallbacks } from "./server.js";

// --- Sessions & connections ---
export { ConnectionSession } from "./session.js";
export type {
  SessionStatus,
  SessionCallbacks,
  SessionOptions,
  ConnectCallback,
  MessageCallback,
} from "./session.js";
export { WebSocketConnection } from "./connection.js";
export { ClientRegistry } from "./registry.js";
export { Mutex } from "./mutex.js";
export type { Release } from "./mutex.js";

// --- Codec ---
export {
  Opcode,
  CLOSE_SENTINEL,
  encodeFrame,
  encodeMaskedFrame,
  applyMask,
  readFrameHeader,
  frameLength,
  decodeFrame,
} from "./codec.js";
export type { FrameHeader } from "./codec.js";
export {
  textMessage,
  binaryMessage,
  deltaMessage,
  encodeMessage,
  flattenDelta,
  parseDelta,
} from "./message.js";
export type {
  DeltaField,
  TextMessage,
  BinaryMessage,
  DeltaMessage,
  ApplicationMessage,
  OutboundMessage,
  ParsedDelta,
} from "./message.js";
export { FrameAccumulator, SocketReader } from "./reader.js";

// --- Handshake ---
export {
  WS_GUID,
  HANDSHAKE_REJECT,
  computeAcceptKey,
  extractClientKey,
  buildUpgradeResponse,
  processHandshake,
  findHeaderEnd,
} from "./handshake.js";
export type { HandshakeResult } from "./handshake.js";

// --- Configuration ---
export {
  DEFAULT_PORT,
  DEFAULT_HOST,
  DEFAULT_MAX_HANDSHAKE_BYTES,
  DEFAULT_MAX_PAYLOAD_LENGTH,
  resolveServerConfig,
} from "./config.js";
export type { WebSocketServerConfig, ResolvedServerConfig } from "./config.js";

// --- Retry ---
export { withRetry, computeDelay, isTransientError, DEFAULT_RETRY } from "./retry.js";
export type { RetryOptions, WithRetryOptions } from "./retry.js";

// --- Logging ---
export { createConsoleLogger, silentLogger, describeError } from "./logger.js";
export type { Logger, ConsoleLoggerOptions } from "./logger.js";

// --- Errors ---
export {
  WebSocketError,
  HandshakeError,
  FrameError,
  TransportError,
  RegistryError,
  ConfigError,
  toTransportError,
} from "./errors.js";
export type { WebSocketErrorCode } from "./errors.js";
