/**
 * WebSocket frame codec.
 *
 * Pure functions between raw frame bytes and payloads. Outbound frames are
 * single, unfragmented and unmasked; inbound frames are single, unfragmented
 * and masked by the client.
 */

import { FrameError } from "./errors.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Frame opcodes used by this server. */
export const Opcode = {
  Text: 0x1,
  Binary: 0x2,
  Close: 0x8,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

const FIN = 0x80;
const MASK_BIT = 0x80;
const LENGTH_16 = 126;
const LENGTH_64 = 127;
const MASK_SIZE = 4;

/** Unmasked payload of a "normal closure" (status 1000, no reason). */
export const CLOSE_SENTINEL = Uint8Array.of(0x03, 0xe9);

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/** Number of bytes the length field takes for a payload of `length` bytes. */
function lengthFieldSize(length: number): number {
  if (length < LENGTH_16) return 1;
  if (length <= 0xffff) return 3;
  return 9;
}

function writeHeader(frame: Buffer, firstByte: number, length: number, maskBit: number): number {
  frame[0] = firstByte;
  if (length < LENGTH_16) {
    frame[1] = maskBit | length;
    return 2;
  }
  if (length <= 0xffff) {
    frame[1] = maskBit | LENGTH_16;
    frame.writeUInt16BE(length, 2);
    return 4;
  }
  frame[1] = maskBit | LENGTH_64;
  frame.writeBigUInt64BE(BigInt(length), 2);
  return 10;
}

/**
 * Encode `payload` as one server→client frame with FIN set.
 */
export function encodeFrame(payload: Uint8Array, opcode: Opcode): Buffer {
  const frame = Buffer.alloc(1 + lengthFieldSize(payload.length) + payload.length);
  const offset = writeHeader(frame, FIN | opcode, payload.length, 0);
  frame.set(payload, offset);
  return frame;
}

/**
 * Encode `payload` as one client→server frame, masked with `mask`.
 * This is what a browser puts on the wire.
 */
export function encodeMaskedFrame(payload: Uint8Array, opcode: Opcode, mask: Uint8Array): Buffer {
  if (mask.length !== MASK_SIZE) {
    throw new RangeError(`Mask key must be ${MASK_SIZE} bytes, got ${mask.length}`);
  }
  const frame = Buffer.alloc(1 + lengthFieldSize(payload.length) + MASK_SIZE + payload.length);
  const offset = writeHeader(frame, FIN | opcode, payload.length, MASK_BIT);
  frame.set(mask, offset);
  frame.set(applyMask(payload, mask), offset + MASK_SIZE);
  return frame;
}

// ---------------------------------------------------------------------------
// Masking
// ---------------------------------------------------------------------------

/**
 * XOR every byte with `mask[i % 4]`. Applying the same mask twice yields the
 * original bytes. Returns a new buffer.
 */
export function applyMask(payload: Uint8Array, mask: Uint8Array): Buffer {
  const out = Buffer.alloc(payload.length);
  for (let i = 0; i < payload.length; i++) {
    out[i] = payload[i] ^ mask[i % MASK_SIZE];
  }
  return out;
}

// ---------------------------------------------------------------------------
// Header parsing
// ---------------------------------------------------------------------------

/** Parsed fixed part of a frame. */
export interface FrameHeader {
  fin: boolean;
  opcode: number;
  masked: boolean;
  /** Declared payload length in bytes. */
  payloadLength: number;
  /** Offset of the mask key (masked frames) or the payload (unmasked frames). */
  headerLength: number;
}

/**
 * Parse the header at the start of `data`. Returns `undefined` if `data`
 * does not yet hold the whole length field.
 */
export function readFrameHeader(data: Uint8Array): FrameHeader | undefined {
  if (data.length < 2) return undefined;

  const fin = (data[0] & FIN) !== 0;
  const opcode = data[0] & 0x0f;
  const masked = (data[1] & MASK_BIT) !== 0;
  const indicator = data[1] & 0x7f;

  if (indicator === LENGTH_16) {
    if (data.length < 4) return undefined;
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    return { fin, opcode, masked, payloadLength: view.getUint16(2), headerLength: 4 };
  }

  if (indicator === LENGTH_64) {
    if (data.length < 10) return undefined;
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const length = view.getBigUint64(2);
    if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FrameError(`Frame length ${length} is too large`);
    }
    return { fin, opcode, masked, payloadLength: Number(length), headerLength: 10 };
  }

  return { fin, opcode, masked, payloadLength: indicator, headerLength: 2 };
}

/**
 * Total size in bytes of the frame starting at `data[0]`, or `undefined`
 * while the header is incomplete. Frames are self-delimiting.
 */
export function frameLength(data: Uint8Array): number | undefined {
  const header = readFrameHeader(data);
  if (!header) return undefined;
  return header.headerLength + (header.masked ? MASK_SIZE : 0) + header.payloadLength;
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

function isCloseSentinel(payload: Uint8Array): boolean {
  return payload.length === 2 && payload[0] === CLOSE_SENTINEL[0] && payload[1] === CLOSE_SENTINEL[1];
}

/**
 * Decode one client frame and return its unmasked payload.
 *
 * Returns `null` ("no message") when the input is empty or the payload is the
 * close sentinel `03 E9`, whatever the opcode. Throws {@link FrameError} when
 * the frame is truncated or was sent without a mask.
 */
export function decodeFrame(data: Uint8Array | null | undefined): Buffer | null {
  if (!data || data.length === 0) return null;

  const header = readFrameHeader(data);
  if (!header) {
    throw new FrameError(`Truncated frame header (${data.length} bytes)`);
  }
  if (!header.masked) {
    throw new FrameError("Client frames must be masked");
  }

  const maskEnd = header.headerLength + MASK_SIZE;
  const end = maskEnd + header.payloadLength;
  if (data.length < end) {
    throw new FrameError(`Truncated frame: expected ${end} bytes, got ${data.length}`);
  }

  const mask = data.subarray(header.headerLength, maskEnd);
  const payload = applyMask(data.subarray(maskEnd, end), mask);
  return isCloseSentinel(payload) ? null : payload;
}
