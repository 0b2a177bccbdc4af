/**
 * Pull-style reading over a socket, and per-connection splitting of the
 * byte stream into whole frames.
 */

import type { Duplex } from "node:stream";
import { readFrameHeader } from "./codec.js";
import type { FrameHeader } from "./codec.js";
import { FrameError, toTransportError } from "./errors.js";
import type { TransportError } from "./errors.js";

/** Longest frame header: 2 fixed bytes plus a 64-bit length. */
const MAX_HEADER_SIZE = 10;
const MASK_SIZE = 4;

// ---------------------------------------------------------------------------
// SocketReader
// ---------------------------------------------------------------------------

interface PendingRead {
  resolve: (chunk: Buffer | null) => void;
  reject: (error: TransportError) => void;
}

/**
 * Turns a socket's `data` / `end` / `error` events into `read()` calls that
 * each wait for the next chunk. `null` means the stream has ended.
 *
 * The socket is paused whenever a chunk arrives that nobody is waiting for,
 * and resumed when a `read()` finds nothing queued, so at most one chunk
 * waits here and the rest stays in the kernel's receive window.
 *
 * A socket error fails the read that is waiting (or the next one) once;
 * later reads see whatever the socket does next.
 */
export class SocketReader {
  private readonly socket: Duplex;
  private readonly chunks: Buffer[] = [];
  private pending: PendingRead | null = null;
  private failure: TransportError | null = null;
  private ended = false;

  constructor(socket: Duplex) {
    this.socket = socket;
    socket.on("data", (chunk: Buffer | string) => {
      this.deliver(typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk);
    });
    socket.on("end", () => this.finish());
    socket.on("close", () => this.finish());
    socket.on("error", (err: Error) => this.fail(toTransportError(err)));
  }

  /** Chunks received but not yet returned by {@link read}. */
  get queuedChunks(): number {
    return this.chunks.length;
  }

  read(): Promise<Buffer | null> {
    const chunk = this.chunks.shift();
    if (chunk) return Promise.resolve(chunk);

    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      return Promise.reject(failure);
    }

    if (this.ended) return Promise.resolve(null);

    return new Promise<Buffer | null>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.socket.resume();
    });
  }

  private deliver(chunk: Buffer): void {
    const pending = this.take();
    if (pending) {
      pending.resolve(chunk);
    } else {
      this.chunks.push(chunk);
      this.socket.pause();
    }
  }

  private finish(): void {
    this.ended = true;
    this.take()?.resolve(null);
  }

  private fail(error: TransportError): void {
    const pending = this.take();
    if (pending) {
      pending.reject(error);
    } else {
      this.failure = error;
    }
  }

  private take(): PendingRead | null {
    const pending = this.pending;
    this.pending = null;
    return pending;
  }
}

// ---------------------------------------------------------------------------
// FrameAccumulator
// ---------------------------------------------------------------------------

/**
 * Buffers inbound bytes until at least one whole frame is present, then hands
 * complete frames out in order. TCP may split or join frames arbitrarily.
 *
 * Only whole, unfragmented frames are accepted: a frame without FIN, or a
 * continuation frame, is reported as malformed.
 */
export class FrameAccumulator {
  private readonly chunks: Buffer[] = [];
  private length = 0;
  /** Header of the frame at the front, once enough bytes are in. */
  private header: FrameHeader | undefined;

  constructor(private readonly maxPayloadLength: number) {}

  /** Bytes received but not yet returned as part of a frame. */
  get pendingBytes(): number {
    return this.length;
  }

  push(chunk: Buffer): Buffer[] {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.length += chunk.length;
    }

    const frames: Buffer[] = [];
    for (;;) {
      const header = this.header ?? this.readHeader();
      if (!header) break;

      const total = header.headerLength + (header.masked ? MASK_SIZE : 0) + header.payloadLength;
      if (this.length < total) break;

      frames.push(this.take(total));
      this.header = undefined;
    }
    return frames;
  }

  private readHeader(): FrameHeader | undefined {
    if (this.length === 0) return undefined;

    const header = readFrameHeader(Buffer.concat(this.chunks, Math.min(this.length, MAX_HEADER_SIZE)));
    if (!header) return undefined;

    if (!header.fin || header.opcode === 0x0) {
      throw new FrameError("Fragmented messages are not supported");
    }
    if (header.payloadLength > this.maxPayloadLength) {
      throw new FrameError(
        `Frame payload of ${header.payloadLength} bytes exceeds the ${this.maxPayloadLength} byte limit`,
      );
    }
    this.header = header;
    return header;
  }

  /** Remove the first `size` bytes, copying only when they span chunks. */
  private take(size: number): Buffer {
    this.length -= size;

    const first = this.chunks[0];
    if (first.length >= size) {
      if (first.length === size) {
        this.chunks.shift();
      } else {
        this.chunks[0] = first.subarray(size);
      }
      return first.subarray(0, size);
    }

    const out = Buffer.allocUnsafe(size);
    let offset = 0;
    while (offset < size) {
      const next = this.chunks[0];
      const wanted = size - offset;
      if (next.length <= wanted) {
        out.set(next, offset);
        offset += next.length;
        this.chunks.shift();
      } else {
        out.set(next.subarray(0, wanted), offset);
        this.chunks[0] = next.subarray(wanted);
        offset = size;
      }
    }
    return out;
  }
}
