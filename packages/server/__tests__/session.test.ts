/**
 * Tests for ConnectionSession, driven over an in-memory socket.
 */

import { describe, it, expect, vi } from "vitest";
import { Duplex } from "node:stream";
import { ConnectionSession } from "../src/session.js";
import type { ConnectCallback, MessageCallback } from "../src/session.js";
import { ClientRegistry } from "../src/registry.js";
import type { WebSocketConnection } from "../src/connection.js";
import { resolveServerConfig } from "../src/config.js";
import type { Logger } from "../src/logger.js";
import { Opcode, CLOSE_SENTINEL, encodeMaskedFrame } from "../src/codec.js";
import { encodeMessage } from "../src/message.js";
import { HANDSHAKE_REJECT, buildUpgradeResponse, computeAcceptKey } from "../src/handshake.js";
import { FrameError } from "../src/errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const KEY = "dGhlIHNhbXBsZSBub25jZQ==";
const MASK = Uint8Array.of(0xa1, 0xb2, 0xc3, 0xd4);
const REQUEST = `GET / HTTP/1.1\r\nHost: localhost\r\nSec-WebSocket-Key: ${KEY}\r\n\r\n`;
const RESPONSE = buildUpgradeResponse(computeAcceptKey(KEY));

function createFakeSocket(): { socket: Duplex; output: () => Buffer } {
  const written: Buffer[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      callback();
    },
  });
  return { socket, output: () => Buffer.concat(written) };
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function errnoError(code: string): Error {
  return Object.assign(new Error(`simulated ${code}`), { code });
}

function setup(callbacks: {
  onConnect?: ConnectCallback<string>;
  onMessage?: MessageCallback<string>;
} = {}) {
  const { socket, output } = createFakeSocket();
  const registry = new ClientRegistry<WebSocketConnection>();
  const logger = createLogger();
  const config = resolveServerConfig({ logger, readRetry: { initialDelayMs: 1, maxDelayMs: 2 } });
  const session = new ConnectionSession<string>(socket, 1, {
    server: "test-server",
    registry,
    config,
    ...callbacks,
  });
  return { socket, output, registry, logger, session };
}

const clientFrame = (payload: Uint8Array, opcode: Opcode = Opcode.Binary): Buffer =>
  encodeMaskedFrame(payload, opcode, MASK);

// ---------------------------------------------------------------------------
// Handshake
// ---------------------------------------------------------------------------

describe("ConnectionSession handshake", () => {
  it("should start in the connecting state", () => {
    const { session } = setup();
    expect(session.status).toBe("connecting");
  });

  it("should reject a request without a key and never register", async () => {
    const onConnect = vi.fn();
    const onMessage = vi.fn();
    const { socket, output, registry, logger, session } = setup({ onConnect, onMessage });

    const done = session.run();
    expect(session.status).toBe("handshaking");
    socket.push("GET / HTTP/1.1\r\nHost: localhost\r\n\r\n");
    await done;

    expect(output().toString("latin1")).toBe(HANDSHAKE_REJECT);
    expect(await registry.size()).toBe(0);
    expect(onConnect).not.toHaveBeenCalled();
    expect(onMessage).not.toHaveBeenCalled();
    expect(session.status).toBe("closed");
    expect(logger.warn).toHaveBeenCalledWith(
      "connection 1: Upgrade request has no Sec-WebSocket-Key header",
    );
  });

  it("should wait for a request split across chunks", async () => {
    const onConnect = vi.fn();
    const { socket, output, session } = setup({ onConnect });

    const done = session.run();
    socket.push(REQUEST.slice(0, 10));
    socket.push(REQUEST.slice(10));
    socket.push(clientFrame(CLOSE_SENTINEL, Opcode.Close));
    await done;

    expect(output().toString("latin1")).toBe(RESPONSE);
    expect(onConnect).toHaveBeenCalledTimes(1);
  });

  it("should give up when the peer hangs up mid-request", async () => {
    const onConnect = vi.fn();
    const { socket, output, session } = setup({ onConnect });

    const done = session.run();
    socket.push("GET / HTTP/1.1\r\n");
    socket.push(null);
    await done;

    expect(output().length).toBe(0);
    expect(onConnect).not.toHaveBeenCalled();
    expect(session.status).toBe("closed");
  });
});

// ---------------------------------------------------------------------------
// Active loop
// ---------------------------------------------------------------------------

describe("ConnectionSession active loop", () => {
  it("should register, greet, deliver messages in order, then clean up", async () => {
    const seenInRegistry: boolean[] = [];
    let registryRef: ClientRegistry<WebSocketConnection> | undefined;
    const onConnect = vi.fn(async (_server: string, connection: WebSocketConnection) => {
      seenInRegistry.push((await registryRef?.has(connection)) ?? false);
      await connection.send("Welcome!");
    });
    const payloads: Array<Buffer | null> = [];
    const onMessage: MessageCallback<string> = (_server, _connection, payload) => {
      payloads.push(payload);
    };
    const { socket, output, registry, session } = setup({ onConnect, onMessage });
    registryRef = registry;

    const done = session.run();
    socket.push(
      Buffer.concat([
        Buffer.from(REQUEST, "latin1"),
        clientFrame(Uint8Array.of(1, 2, 3)),
        clientFrame(Buffer.from("second"), Opcode.Text),
        clientFrame(CLOSE_SENTINEL, Opcode.Close),
      ]),
    );
    await done;

    expect(onConnect).toHaveBeenCalledTimes(1);
    expect(onConnect.mock.calls[0][0]).toBe("test-server");
    expect(seenInRegistry).toEqual([true]);
    expect(payloads).toEqual([Buffer.from([1, 2, 3]), Buffer.from("second"), null]);
    expect(await registry.size()).toBe(0);
    expect(session.status).toBe("closed");

    const out = output();
    expect(out.subarray(0, RESPONSE.length).toString("latin1")).toBe(RESPONSE);
    expect(out.subarray(RESPONSE.length)).toEqual(encodeMessage("Welcome!"));
  });

  it("should ignore frames after the close sentinel", async () => {
    const onMessage = vi.fn();
    const { socket, session } = setup({ onMessage });

    const done = session.run();
    socket.push(
      Buffer.concat([
        Buffer.from(REQUEST, "latin1"),
        clientFrame(CLOSE_SENTINEL, Opcode.Close),
        clientFrame(Uint8Array.of(9)),
      ]),
    );
    await done;

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage).toHaveBeenCalledWith("test-server", expect.anything(), null);
  });

  it("should treat end of stream as a close", async () => {
    const onMessage = vi.fn();
    const { socket, registry, session } = setup({ onMessage });

    const done = session.run();
    socket.push(REQUEST);
    socket.push(null);
    await done;

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage.mock.calls[0][2]).toBeNull();
    expect(await registry.size()).toBe(0);
  });

  it("should wait for each message callback before decoding the next frame", async () => {
    const events: string[] = [];
    const onMessage: MessageCallback<string> = async (_server, _connection, payload) => {
      const label = payload === null ? "close" : payload.toString();
      events.push(`start:${label}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`end:${label}`);
    };
    const { socket, session } = setup({ onMessage });

    const done = session.run();
    socket.push(
      Buffer.concat([
        Buffer.from(REQUEST, "latin1"),
        clientFrame(Buffer.from("a"), Opcode.Text),
        clientFrame(Buffer.from("b"), Opcode.Text),
        clientFrame(CLOSE_SENTINEL, Opcode.Close),
      ]),
    );
    await done;

    expect(events).toEqual(["start:a", "end:a", "start:b", "end:b", "start:close", "end:close"]);
  });
});

describe("ConnectionSession backpressure", () => {
  it("should pause the socket while a message callback is busy", async () => {
    const gate = deferred();
    const received: Array<Buffer | null> = [];
    const onMessage: MessageCallback<string> = async (_server, _connection, payload) => {
      received.push(payload);
      await gate.promise;
    };
    const { socket, session } = setup({ onMessage });
    const frames = [1, 2, 3, 4, 5, 6].map((n) => clientFrame(Uint8Array.of(n)));

    const done = session.run();
    socket.push(Buffer.concat([Buffer.from(REQUEST, "latin1"), frames[0]]));
    for (const frame of frames.slice(1)) socket.push(frame);
    await new Promise((resolve) => setImmediate(resolve));

    expect(received).toEqual([Buffer.from([1])]);
    expect(socket.isPaused()).toBe(true);
    expect(socket.readableLength).toBe(4 * frames[0].length);

    gate.resolve();
    socket.push(clientFrame(CLOSE_SENTINEL, Opcode.Close));
    await done;

    expect(received).toEqual([...[1, 2, 3, 4, 5, 6].map((n) => Buffer.from([n])), null]);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("ConnectionSession failures", () => {
  it("should retry a transient read error and carry on", async () => {
    const connected = deferred();
    const onMessage = vi.fn();
    const { socket, logger, session } = setup({ onConnect: () => connected.resolve(), onMessage });

    const done = session.run();
    socket.push(REQUEST);
    await connected.promise;

    socket.emit("error", errnoError("EAGAIN"));
    socket.push(clientFrame(Uint8Array.of(4, 5)));
    socket.push(clientFrame(CLOSE_SENTINEL, Opcode.Close));
    await done;

    expect(onMessage.mock.calls.map((call) => call[2])).toEqual([Buffer.from([4, 5]), null]);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining("retry 1"));
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("should end the session on a non-transient read error", async () => {
    const connected = deferred();
    const onMessage = vi.fn();
    const { socket, registry, logger, session } = setup({
      onConnect: () => connected.resolve(),
      onMessage,
    });

    const done = session.run();
    socket.push(REQUEST);
    await connected.promise;

    socket.emit("error", errnoError("ECONNRESET"));
    await done;

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage.mock.calls[0][2]).toBeNull();
    expect(await registry.size()).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith("connection 1: session terminated", expect.anything());
  });

  it("should end the session on a malformed frame", async () => {
    const onMessage = vi.fn();
    const { socket, registry, logger, session } = setup({ onMessage });

    const done = session.run();
    socket.push(Buffer.concat([Buffer.from(REQUEST, "latin1"), Buffer.from([0x81, 0x01, 0x41])]));
    await done;

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage.mock.calls[0][2]).toBeNull();
    expect(await registry.size()).toBe(0);
    expect(logger.error).toHaveBeenCalledWith("connection 1: session terminated", expect.any(FrameError));
  });

  it("should end the session when the connect callback throws", async () => {
    const onMessage = vi.fn();
    const { socket, registry, logger, session } = setup({
      onConnect: () => {
        throw new Error("no greeting today");
      },
      onMessage,
    });

    const done = session.run();
    socket.push(Buffer.concat([Buffer.from(REQUEST, "latin1"), clientFrame(Uint8Array.of(1))]));
    await done;

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage.mock.calls[0][2]).toBeNull();
    expect(await registry.size()).toBe(0);
    expect(logger.error).toHaveBeenCalledWith("connection 1: session terminated", expect.any(Error));
  });

  it("should close when aborted while active", async () => {
    const connected = deferred();
    const onMessage = vi.fn();
    const { socket, registry, session } = setup({ onConnect: () => connected.resolve(), onMessage });

    const done = session.run();
    socket.push(REQUEST);
    await connected.promise;

    session.abort();
    await done;

    expect(socket.destroyed).toBe(true);
    expect(onMessage.mock.calls.map((call) => call[2])).toEqual([null]);
    expect(await registry.size()).toBe(0);
  });
});
