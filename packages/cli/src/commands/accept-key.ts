/**
 * `wirelet accept-key <key>` command — print the Sec-WebSocket-Accept value
 * for a client key.
 */

import { computeAcceptKey } from "@wirelet/server";

export function acceptKeyCommand(key: string): string {
  const trimmed = key.trim();
  if (trimmed === "") {
    throw new Error("Client key must not be empty");
  }
  const token = computeAcceptKey(trimmed);
  console.log(token);
  return token;
}
