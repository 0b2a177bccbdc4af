/**
 * Application messages and their encoding into frames.
 *
 * A message is text, opaque bytes, or a "delta": keys to upsert and keys to
 * delete, flattened into one binary payload so an application can push an
 * incremental state update without a serialization library.
 */

import { Opcode, encodeFrame, readFrameHeader } from "./codec.js";
import { FrameError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A key or value inside a delta. Strings are sent as UTF-8. */
export type DeltaField = string | Uint8Array;

export interface TextMessage {
  kind: "text";
  text: string;
}

export interface BinaryMessage {
  kind: "binary";
  data: Uint8Array;
}

export interface DeltaMessage {
  kind: "delta";
  /** Ordered (key, value) pairs to upsert. */
  updates: ReadonlyArray<readonly [DeltaField, DeltaField]>;
  /** Keys to delete. */
  deletes: readonly DeltaField[];
}

export type ApplicationMessage = TextMessage | BinaryMessage | DeltaMessage;

/** Anything `encodeMessage` accepts; bare strings and bytes are shorthands. */
export type OutboundMessage = ApplicationMessage | string | Uint8Array;

/** A delta read back from the wire, every field as raw bytes. */
export interface ParsedDelta {
  updates: Array<[Buffer, Buffer]>;
  deletes: Buffer[];
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function textMessage(text: string): TextMessage {
  return { kind: "text", text };
}

export function binaryMessage(data: Uint8Array): BinaryMessage {
  return { kind: "binary", data };
}

export function deltaMessage(
  updates: ReadonlyArray<readonly [DeltaField, DeltaField]> = [],
  deletes: readonly DeltaField[] = [],
): DeltaMessage {
  return { kind: "delta", updates, deletes };
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function normalize(message: OutboundMessage): ApplicationMessage {
  if (typeof message === "string") return textMessage(message);
  if (message instanceof Uint8Array) return binaryMessage(message);
  return message;
}

/** A delta field is framed exactly like a top-level payload of its type. */
function encodeField(field: DeltaField): Buffer {
  return typeof field === "string"
    ? encodeFrame(Buffer.from(field, "utf-8"), Opcode.Text)
    : encodeFrame(field, Opcode.Binary);
}

function encodeCount(count: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(count, 0);
  return buf;
}

/**
 * Flatten a delta into its binary layout:
 * `u32 updateCount, (key, value)*, u32 deleteCount, key*`.
 */
export function flattenDelta(delta: DeltaMessage): Buffer {
  const parts: Buffer[] = [encodeCount(delta.updates.length)];
  for (const [key, value] of delta.updates) {
    parts.push(encodeField(key), encodeField(value));
  }
  parts.push(encodeCount(delta.deletes.length));
  for (const key of delta.deletes) {
    parts.push(encodeField(key));
  }
  return Buffer.concat(parts);
}

/**
 * Encode an application message as one unmasked frame ready to write to a
 * client. Text goes out with opcode 1, everything else with opcode 2.
 */
export function encodeMessage(message: OutboundMessage): Buffer {
  const msg = normalize(message);
  switch (msg.kind) {
    case "text":
      return encodeFrame(Buffer.from(msg.text, "utf-8"), Opcode.Text);
    case "binary":
      return encodeFrame(msg.data, Opcode.Binary);
    case "delta":
      return encodeFrame(flattenDelta(msg), Opcode.Binary);
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

class DeltaCursor {
  private offset = 0;

  constructor(private readonly data: Buffer) {}

  count(): number {
    if (this.offset + 4 > this.data.length) {
      throw new FrameError(`Delta truncated at offset ${this.offset}: expected a count`);
    }
    const value = this.data.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  field(): Buffer {
    const rest = this.data.subarray(this.offset);
    const header = readFrameHeader(rest);
    if (!header) {
      throw new FrameError(`Delta truncated at offset ${this.offset}: expected a field header`);
    }
    const end = header.headerLength + header.payloadLength;
    if (end > rest.length) {
      throw new FrameError(`Delta truncated at offset ${this.offset}: field needs ${end} bytes`);
    }
    this.offset += end;
    return rest.subarray(header.headerLength, end);
  }

  get done(): boolean {
    return this.offset === this.data.length;
  }
}

/**
 * Read a flattened delta payload (the body of a binary frame) back into its
 * updates and deletes.
 */
export function parseDelta(payload: Uint8Array): ParsedDelta {
  const cursor = new DeltaCursor(Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength));

  const updates: Array<[Buffer, Buffer]> = [];
  const updateCount = cursor.count();
  for (let i = 0; i < updateCount; i++) {
    updates.push([cursor.field(), cursor.field()]);
  }

  const deletes: Buffer[] = [];
  const deleteCount = cursor.count();
  for (let i = 0; i < deleteCount; i++) {
    deletes.push(cursor.field());
  }

  if (!cursor.done) {
    throw new FrameError("Trailing bytes after delta");
  }
  return { updates, deletes };
}
