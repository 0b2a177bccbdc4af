/**
 * Opening handshake: find the client's key in the raw upgrade request and
 * answer with the 101 response that proves we understood it.
 */

import { createHash } from "node:crypto";
import { HandshakeError } from "./errors.js";

/** GUID appended to the client key before hashing (RFC 6455, 1.3). */
export const WS_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

/** Sent when the request carries no key. */
export const HANDSHAKE_REJECT = "HTTP/1.1 400 Bad Request\r\n\r\n";

const HEADER_TERMINATOR = "\r\n\r\n";
const KEY_HEADER = "sec-websocket-key";

export type HandshakeResult =
  | { ok: true; key: string; acceptKey: string; response: Buffer }
  | { ok: false; error: HandshakeError; response: Buffer };

/**
 * `base64(sha1(key + GUID))`.
 */
export function computeAcceptKey(clientKey: string): string {
  return createHash("sha1").update(clientKey + WS_GUID).digest("base64");
}

/**
 * Return the value of the first `Sec-WebSocket-Key` line, if any.
 */
export function extractClientKey(request: Uint8Array | string): string | undefined {
  const text = typeof request === "string" ? request : Buffer.from(request).toString("latin1");

  for (const line of text.split(/\r?\n/)) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    if (line.slice(0, colon).trim().toLowerCase() !== KEY_HEADER) continue;

    const value = line.slice(colon + 1).trim();
    return value.length > 0 ? value : undefined;
  }
  return undefined;
}

/**
 * Build the 101 Switching Protocols response for an accept token.
 */
export function buildUpgradeResponse(acceptKey: string): string {
  return [
    "HTTP/1.1 101 Switching Protocols",
    "Upgrade: websocket",
    "Connection: Upgrade",
    `Sec-WebSocket-Accept: ${acceptKey}`,
    "",
    "",
  ].join("\r\n");
}

/**
 * Run the handshake over the bytes received so far. The caller writes
 * `response` back in both outcomes.
 */
export function processHandshake(request: Uint8Array | string): HandshakeResult {
  const key = extractClientKey(request);
  if (key === undefined) {
    return {
      ok: false,
      error: new HandshakeError("Upgrade request has no Sec-WebSocket-Key header"),
      response: Buffer.from(HANDSHAKE_REJECT, "latin1"),
    };
  }

  const acceptKey = computeAcceptKey(key);
  return {
    ok: true,
    key,
    acceptKey,
    response: Buffer.from(buildUpgradeResponse(acceptKey), "latin1"),
  };
}

/**
 * Index just past the blank line ending the request header, or `-1` if it
 * has not arrived yet.
 */
export function findHeaderEnd(data: Buffer): number {
  const index = data.indexOf(HEADER_TERMINATOR, 0, "latin1");
  return index === -1 ? -1 : index + HEADER_TERMINATOR.length;
}
