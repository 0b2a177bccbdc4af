/**
 * WebSocketConnection — the handle an application holds for one client.
 */

import type { Duplex } from "node:stream";
import { TransportError, toTransportError } from "./errors.js";
import { encodeMessage } from "./message.js";
import type { OutboundMessage } from "./message.js";

export class WebSocketConnection {
  /** Sequence number assigned by the server, for logs. */
  readonly id: number;
  private readonly socket: Duplex;

  constructor(socket: Duplex, id: number) {
    this.socket = socket;
    this.id = id;
  }

  /** True once the socket can no longer be written to. */
  get closed(): boolean {
    return this.socket.destroyed || !this.socket.writable;
  }

  /** Write raw bytes, resolving once they have been handed to the socket. */
  write(data: Uint8Array | string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError(`Connection ${this.id} is closed`));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(toTransportError(err));
        } else {
          resolve();
        }
      });
    });
  }

  /** Encode `message` as a frame and write it. */
  send(message: OutboundMessage): Promise<void> {
    return this.write(encodeMessage(message));
  }

  /** Flush pending writes, then close the socket. Safe to call repeatedly. */
  close(): void {
    if (this.socket.destroyed) return;
    if (this.socket.writableEnded) {
      this.socket.destroy();
      return;
    }
    this.socket.end(() => this.socket.destroy());
  }

  /** Close immediately, discarding anything unsent. */
  destroy(): void {
    this.socket.destroy();
  }
}
