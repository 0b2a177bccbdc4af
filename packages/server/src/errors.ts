/**
 * Typed error hierarchy for @wirelet/server.
 *
 * Every error carries a machine-readable `code` field so callers can
 * branch on the failure kind without string matching.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export type WebSocketErrorCode =
  | "HANDSHAKE_FAILED"
  | "MALFORMED_FRAME"
  | "TRANSPORT_ERROR"
  | "REGISTRY_MISUSE"
  | "CONFIG_ERROR";

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

/**
 * Base error class for all @wirelet/server errors.
 */
export class WebSocketError extends Error {
  readonly code: WebSocketErrorCode;

  constructor(code: WebSocketErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Handshake error
// ---------------------------------------------------------------------------

/**
 * The opening request carried no usable `Sec-WebSocket-Key`.
 */
export class HandshakeError extends WebSocketError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("HANDSHAKE_FAILED", message, options?.cause ? { cause: options.cause } : undefined);
  }
}

// ---------------------------------------------------------------------------
// Frame error
// ---------------------------------------------------------------------------

/**
 * An inbound frame could not be parsed (truncated, unmasked, oversized).
 */
export class FrameError extends WebSocketError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MALFORMED_FRAME", message, options?.cause ? { cause: options.cause } : undefined);
  }
}

// ---------------------------------------------------------------------------
// Transport error
// ---------------------------------------------------------------------------

/** errno codes after which a read may succeed if simply tried again. */
const TRANSIENT_CODES = new Set(["EAGAIN", "EWOULDBLOCK", "EINTR", "ENOBUFS"]);

/**
 * A socket read failed. `transient` tells the session whether a bounded
 * retry is worthwhile or the connection is gone.
 */
export class TransportError extends WebSocketError {
  readonly transient: boolean;
  readonly errno?: string;

  constructor(
    message: string,
    options?: { transient?: boolean; errno?: string; cause?: unknown },
  ) {
    super("TRANSPORT_ERROR", message, options?.cause ? { cause: options.cause } : undefined);
    this.transient = options?.transient ?? false;
    this.errno = options?.errno;
  }
}

/**
 * Wrap a raw socket error, classifying it by its errno code.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;

  const errno = readErrnoCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Socket read failed: ${message}`, {
    transient: errno !== undefined && TRANSIENT_CODES.has(errno),
    errno,
    cause: error,
  });
}

function readErrnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

// ---------------------------------------------------------------------------
// Registry error
// ---------------------------------------------------------------------------

/**
 * The client registry was used against its contract (double add, removing a
 * connection that was never added).
 */
export class RegistryError extends WebSocketError {
  constructor(message: string) {
    super("REGISTRY_MISUSE", message);
  }
}

// ---------------------------------------------------------------------------
// Config error
// ---------------------------------------------------------------------------

/**
 * A server option is out of range.
 */
export class ConfigError extends WebSocketError {
  readonly option: string;

  constructor(option: string, message: string) {
    super("CONFIG_ERROR", message);
    this.option = option;
  }
}
