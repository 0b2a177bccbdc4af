/**
 * ConnectionSession — the control loop for one client.
 *
 *   connecting → handshaking → active → closing → closed
 *                     └───────────────────────────→ closed   (rejected)
 *
 * Everything inside one session runs in order: the connect callback is
 * awaited before the first frame is read, and each message callback is
 * awaited before the next frame is decoded.
 */

import type { Duplex } from "node:stream";
import { decodeFrame } from "./codec.js";
import type { ResolvedServerConfig } from "./config.js";
import { WebSocketConnection } from "./connection.js";
import { HANDSHAKE_REJECT, findHeaderEnd, processHandshake } from "./handshake.js";
import type { Logger } from "./logger.js";
import { describeError } from "./logger.js";
import { FrameAccumulator, SocketReader } from "./reader.js";
import type { ClientRegistry } from "./registry.js";
import { withRetry } from "./retry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SessionStatus = "connecting" | "handshaking" | "active" | "closing" | "closed";

/** Invoked once per successful handshake, before any frame is read. */
export type ConnectCallback<S> = (server: S, connection: WebSocketConnection) => void | Promise<void>;

/**
 * Invoked once per decoded inbound frame. `null` is the close notification,
 * delivered exactly once when an active session ends.
 */
export type MessageCallback<S> = (
  server: S,
  connection: WebSocketConnection,
  payload: Buffer | null,
) => void | Promise<void>;

export interface SessionCallbacks<S> {
  onConnect?: ConnectCallback<S>;
  onMessage?: MessageCallback<S>;
}

export interface SessionOptions<S> extends SessionCallbacks<S> {
  /** Passed back to the callbacks. */
  server: S;
  registry: ClientRegistry<WebSocketConnection>;
  config: Pick<ResolvedServerConfig, "maxHandshakeBytes" | "maxPayloadLength" | "readRetry" | "logger">;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class ConnectionSession<S> {
  readonly connection: WebSocketConnection;

  private _status: SessionStatus = "connecting";
  private readonly reader: SocketReader;
  private readonly options: SessionOptions<S>;
  private readonly logger: Logger;

  constructor(socket: Duplex, id: number, options: SessionOptions<S>) {
    this.connection = new WebSocketConnection(socket, id);
    this.reader = new SocketReader(socket);
    this.options = options;
    this.logger = options.config.logger;
  }

  get status(): SessionStatus {
    return this._status;
  }

  /**
   * Drive the session to completion. Failures are logged and end this
   * session only; the returned promise resolves once the socket is closed.
   */
  async run(): Promise<void> {
    this._status = "handshaking";

    let leftover: Buffer | undefined;
    try {
      leftover = await this.handshake();
    } catch (err) {
      this.logger.warn(`connection ${this.connection.id}: handshake aborted: ${describeError(err)}`);
    }

    if (leftover === undefined) {
      this.connection.close();
      this._status = "closed";
      return;
    }

    this._status = "active";
    await this.options.registry.add(this.connection);
    this.logger.debug(`connection ${this.connection.id}: open`);

    try {
      await this.options.onConnect?.(this.options.server, this.connection);
      await this.receive(leftover);
    } catch (err) {
      this.logger.error(`connection ${this.connection.id}: session terminated`, err);
    } finally {
      this._status = "closing";
      await this.notifyClosed();
      await this.options.registry.remove(this.connection);
      this.connection.close();
      this._status = "closed";
      this.logger.debug(`connection ${this.connection.id}: closed`);
    }
  }

  /** Tear the socket down; a running loop notices and cleans up. */
  abort(): void {
    this.connection.destroy();
  }

  /**
   * Read until the request header is complete, answer it, and return the
   * bytes that followed the header. `undefined` means the session is over.
   */
  private async handshake(): Promise<Buffer | undefined> {
    const { maxHandshakeBytes } = this.options.config;
    let received = Buffer.alloc(0);

    for (;;) {
      const end = findHeaderEnd(received);
      if (end !== -1) {
        const result = processHandshake(received.subarray(0, end));
        await this.connection.write(result.response);
        if (!result.ok) {
          this.logger.warn(`connection ${this.connection.id}: ${result.error.message}`);
          return undefined;
        }
        return received.subarray(end);
      }

      if (received.length > maxHandshakeBytes) {
        this.logger.warn(
          `connection ${this.connection.id}: request header exceeds ${maxHandshakeBytes} bytes`,
        );
        await this.connection.write(HANDSHAKE_REJECT);
        return undefined;
      }

      const chunk = await this.readChunk();
      if (chunk === null) {
        this.logger.debug(`connection ${this.connection.id}: closed during handshake`);
        return undefined;
      }
      received = Buffer.concat([received, chunk]);
    }
  }

  private async receive(initial: Buffer): Promise<void> {
    const frames = new FrameAccumulator(this.options.config.maxPayloadLength);

    let chunk: Buffer | null = initial;
    while (chunk !== null) {
      for (const frame of frames.push(chunk)) {
        const payload = decodeFrame(frame);
        if (payload === null) {
          this.logger.debug(`connection ${this.connection.id}: close requested by peer`);
          return;
        }
        await this.options.onMessage?.(this.options.server, this.connection, payload);
      }
      chunk = await this.readChunk();
    }
    this.logger.debug(`connection ${this.connection.id}: peer hung up`);
  }

  private readChunk(): Promise<Buffer | null> {
    return withRetry(() => this.reader.read(), {
      ...this.options.config.readRetry,
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(
          `connection ${this.connection.id}: read failed (${describeError(err)}), ` +
            `retry ${attempt} in ${Math.round(delayMs)}ms`,
        );
      },
    });
  }

  private async notifyClosed(): Promise<void> {
    try {
      await this.options.onMessage?.(this.options.server, this.connection, null);
    } catch (err) {
      this.logger.error(`connection ${this.connection.id}: close notification failed`, err);
    }
  }
}
