/**
 * @fileoverview Wire codec for step relay connections.
 *
 * Every message travels as one frame: a 4-byte little-endian length prefix
 * followed by that many bytes of UTF-8 JSON. Frames are self-delimiting, so
 * a reader can reassemble them from arbitrary TCP segment boundaries.
 */

import { TextDecoder } from 'node:util';
import type { z } from 'zod';
import { DEFAULT_MAX_FRAME_BYTES, FRAME_HEADER_BYTES, MAX_FRAME_BYTES_LIMIT } from './constants.js';
import { FrameError } from './errors.js';
import {
  formatIssues,
  ResponseMessage,
  type StepRecord,
  StepRecordFromWire,
  toWireRecord,
  type WireStepRecord,
} from './protocol.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

// ============ Encoding ============

/**
 * Prefix a payload with its length.
 * @throws {FrameError} if the payload does not fit a u32 length prefix
 */
export function encodeFrame(payload: Uint8Array): Buffer {
  if (payload.length > MAX_FRAME_BYTES_LIMIT) {
    throw new FrameError('frame too large for u32 length prefix');
  }

  const framed = Buffer.alloc(FRAME_HEADER_BYTES + payload.length);
  framed.writeUInt32LE(payload.length, 0);
  framed.set(payload, FRAME_HEADER_BYTES);
  return framed;
}

/**
 * Serialize a value to JSON and frame it.
 */
export function encodeMessage(value: WireStepRecord | ResponseMessage): Buffer {
  return encodeFrame(Buffer.from(JSON.stringify(value), 'utf8'));
}

/**
 * Encode a step record as one complete frame, with `step_id` and
 * `wait_seconds` field names.
 */
export function encode(record: StepRecord): Buffer {
  return encodeMessage(toWireRecord(record));
}

// ============ Decoding ============

/**
 * Decode a frame payload (without its length prefix) against a schema.
 * @throws {FrameError} if the payload is not UTF-8 JSON matching the schema
 */
export function decodePayload<T>(
  payload: Uint8Array,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(utf8.decode(payload));
  } catch (error) {
    throw new FrameError(`${label} frame is not valid JSON`, { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new FrameError(`${label} frame is invalid: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function unframe(bytes: Uint8Array): Uint8Array {
  if (bytes.length < FRAME_HEADER_BYTES) {
    throw new FrameError(
      `truncated frame header: got ${bytes.length} of ${FRAME_HEADER_BYTES} bytes`
    );
  }

  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const payloadLength = view.readUInt32LE(0);
  const frameLength = FRAME_HEADER_BYTES + payloadLength;

  if (bytes.length < frameLength) {
    throw new FrameError(
      `truncated frame: expected ${payloadLength} payload bytes, got ${bytes.length - FRAME_HEADER_BYTES}`
    );
  }
  if (bytes.length > frameLength) {
    throw new FrameError(`${bytes.length - frameLength} trailing bytes after frame`);
  }
  return view.subarray(FRAME_HEADER_BYTES);
}

/**
 * Decode a step record payload taken from a {@link FrameReader}.
 */
export function decodeStepRecord(payload: Uint8Array): StepRecord {
  return decodePayload(payload, StepRecordFromWire, 'step record');
}

/**
 * Decode a response payload taken from a {@link FrameReader}.
 */
export function decodeResponse(payload: Uint8Array): ResponseMessage {
  return decodePayload(payload, ResponseMessage, 'response');
}

/**
 * Decode exactly one complete frame holding a step record.
 * @throws {FrameError} on truncated, oversized, trailing or malformed input
 */
export function decode(bytes: Uint8Array): StepRecord {
  return decodeStepRecord(unframe(bytes));
}

/**
 * Decode exactly one complete frame holding a response message.
 */
export function decodeResponseFrame(bytes: Uint8Array): ResponseMessage {
  return decodeResponse(unframe(bytes));
}

// ============ Stream Reassembly ============

/**
 * Buffers bytes from a stream and hands out complete frame payloads.
 */
export class FrameReader {
  private buf: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  /** Append a chunk read from the stream. */
  push(chunk: Uint8Array): void {
    this.buf = this.buf.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buf, chunk]);
  }

  /**
   * Take the next complete frame payload.
   * @returns the payload, or null while the frame is still incomplete
   * @throws {FrameError} if the announced frame length exceeds the limit
   */
  next(): Uint8Array | null {
    if (this.buf.length < FRAME_HEADER_BYTES) return null;

    const frameLen = this.buf.readUInt32LE(0);
    if (frameLen > this.maxFrameBytes) {
      throw new FrameError(`frame of ${frameLen} bytes exceeds the ${this.maxFrameBytes} byte limit`);
    }

    const needed = FRAME_HEADER_BYTES + frameLen;
    if (this.buf.length < needed) return null;

    const frame = new Uint8Array(this.buf.subarray(FRAME_HEADER_BYTES, needed));
    this.buf = this.buf.subarray(needed);
    return frame;
  }

  /** Bytes buffered that do not yet form a complete frame. */
  get pendingBytes(): number {
    return this.buf.length;
  }
}
