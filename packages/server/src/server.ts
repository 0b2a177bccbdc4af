/**
 * WebSocketServer — listens on a TCP port and runs one ConnectionSession per
 * accepted socket.
 *
 * @example
 * ```typescript
 * const server = new WebSocketServer({ port: 8001 });
 * await server.serve({
 *   onConnect: (srv, connection) => connection.send("Welcome!"),
 *   onMessage: (srv, connection, payload) => {
 *     if (payload) console.log(payload.toString("utf-8"));
 *   },
 * });
 * await server.broadcast(deltaMessage([["pose", "0 0 1"]], ["stale-key"]));
 * ```
 */

import * as net from "node:net";
import { resolveServerConfig } from "./config.js";
import type { ResolvedServerConfig, WebSocketServerConfig } from "./config.js";
import type { WebSocketConnection } from "./connection.js";
import type { Logger } from "./logger.js";
import { describeError } from "./logger.js";
import { encodeMessage } from "./message.js";
import type { OutboundMessage } from "./message.js";
import { ClientRegistry } from "./registry.js";
import { ConnectionSession } from "./session.js";
import type { ConnectCallback, MessageCallback } from "./session.js";

export interface ServerCallbacks {
  onConnect?: ConnectCallback<WebSocketServer>;
  onMessage?: MessageCallback<WebSocketServer>;
}

export class WebSocketServer {
  /** Live, handshaken connections. */
  readonly registry = new ClientRegistry<WebSocketConnection>();

  private readonly config: ResolvedServerConfig;
  private readonly logger: Logger;
  private listener: net.Server | null = null;
  private readonly sessions = new Map<ConnectionSession<WebSocketServer>, Promise<void>>();
  private nextConnectionId = 0;

  constructor(config: WebSocketServerConfig = {}) {
    this.config = resolveServerConfig(config);
    this.logger = this.config.logger;
  }

  /** Configured port (0 until bound means "ephemeral"; see {@link address}). */
  get port(): number {
    return this.config.port;
  }

  get listening(): boolean {
    return this.listener?.listening ?? false;
  }

  /** Number of sessions in any state, including ones still handshaking. */
  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Bind and start accepting connections. Resolves with the bound address
   * once listening; the server then accepts until {@link close} is called.
   */
  async serve(callbacks: ServerCallbacks = {}): Promise<net.AddressInfo> {
    if (this.listener) {
      throw new Error("WebSocketServer is already serving");
    }

    const listener = net.createServer((socket) => this.dispatch(socket, callbacks));
    this.listener = listener;

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error): void => {
          listener.off("listening", onListening);
          reject(err);
        };
        const onListening = (): void => {
          listener.off("error", onError);
          resolve();
        };
        listener.once("error", onError);
        listener.once("listening", onListening);
        listener.listen(this.config.port, this.config.host);
      });
    } catch (err) {
      this.listener = null;
      throw err;
    }

    listener.on("error", (err) => {
      this.logger.error("listener error", err);
    });

    const address = this.address();
    if (!address) {
      throw new Error("WebSocketServer is not bound to a TCP address");
    }
    this.logger.info(`listening on ${address.address}:${address.port}`);
    return address;
  }

  /** Bound address, or `null` when not listening. */
  address(): net.AddressInfo | null {
    const address = this.listener?.address();
    return address && typeof address === "object" ? address : null;
  }

  /** Encode a message into frame bytes for {@link WebSocketConnection.write}. */
  encodeMessage(message: OutboundMessage): Buffer {
    return encodeMessage(message);
  }

  /**
   * Send `message` to every registered connection, holding the registry lock
   * until all writes have been handed off. Resolves with how many succeeded.
   */
  async broadcast(message: OutboundMessage): Promise<number> {
    const frame = encodeMessage(message);
    let delivered = 0;

    await this.registry.forEach(async (connection) => {
      try {
        await connection.write(frame);
        delivered++;
      } catch (err) {
        this.logger.warn(`connection ${connection.id}: broadcast write failed: ${describeError(err)}`);
      }
    });
    return delivered;
  }

  /**
   * Stop accepting, tear down every live session, and wait for them to
   * finish their cleanup.
   */
  async close(): Promise<void> {
    const listener = this.listener;
    if (!listener) return;
    this.listener = null;

    const stopped = new Promise<void>((resolve) => {
      listener.close(() => resolve());
    });

    const running = Array.from(this.sessions.entries());
    for (const [session] of running) {
      session.abort();
    }
    await Promise.all(running.map(([, done]) => done));
    await stopped;
    this.logger.info("stopped");
  }

  private dispatch(socket: net.Socket, callbacks: ServerCallbacks): void {
    const id = ++this.nextConnectionId;
    const session = new ConnectionSession<WebSocketServer>(socket, id, {
      server: this,
      registry: this.registry,
      config: this.config,
      onConnect: callbacks.onConnect,
      onMessage: callbacks.onMessage,
    });
    this.logger.debug(`connection ${id}: accepted from ${socket.remoteAddress ?? "unknown"}`);

    const done = session
      .run()
      .catch((err: unknown) => {
        this.logger.error(`connection ${id}: session failed`, err);
      })
      .finally(() => {
        this.sessions.delete(session);
      });
    this.sessions.set(session, done);
  }
}
