/**
 * Frame Encoding and Decoding
 *
 * Implements the binary protocol:
 * | version (1B) | kind (1B) | flags (1B) | payload (variable) |
 *
 * There is no length prefix and no delimiter: one transport read is one
 * frame, so a frame split across reads (or two frames in one read) cannot be
 * recovered.
 */

import {
  PROTOCOL_VERSION,
  HEADER_SIZE,
  MAX_FRAME_SIZE,
  FLAG_UTF8_TEXT,
} from "./constants.js";
import type { Message, FrameHeader, EncodedFrame } from "./types.js";
import {
  InvalidFrameError,
  InvalidMessageError,
  UnsupportedVersionError,
} from "./errors.js";
import { createMessage, isMessageKind } from "./message.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

// Matches only surrogates that are not part of a pair
const LONE_SURROGATE = /\p{Surrogate}/u;

/**
 * Encode a message for transmission
 *
 * Never throws. A message that cannot be serialized yields an empty buffer
 * and the reason in `error`; callers log it and send nothing.
 */
export function encodeFrame(message: Message): EncodedFrame {
  if (!isMessageKind(message.kind)) {
    return failed(
      new InvalidMessageError(`Unknown message kind: ${message.kind}`, message.kind)
    );
  }
  if (typeof message.body !== "string") {
    return failed(
      new InvalidMessageError("Message body must be a string", message.kind)
    );
  }
  // UTF-8 has no encoding for these; Buffer.from would swap in U+FFFD
  if (LONE_SURROGATE.test(message.body)) {
    return failed(
      new InvalidMessageError(
        "Message body contains an unpaired surrogate",
        message.kind
      )
    );
  }

  const payloadBuffer = Buffer.from(message.body, "utf8");
  const totalLength = HEADER_SIZE + payloadBuffer.length;

  if (totalLength > MAX_FRAME_SIZE) {
    return failed(
      new InvalidMessageError(
        `Frame too large: ${totalLength} bytes exceeds ${MAX_FRAME_SIZE}`,
        message.kind
      )
    );
  }

  const buffer = Buffer.alloc(totalLength);

  // Write header
  buffer.writeUInt8(PROTOCOL_VERSION, 0); // version
  buffer.writeUInt8(message.kind, 1); // kind
  buffer.writeUInt8(FLAG_UTF8_TEXT, 2); // flags

  // Write payload
  payloadBuffer.copy(buffer, HEADER_SIZE);

  return { buffer, error: null };
}

/**
 * Decode one frame occupying the whole buffer
 *
 * @returns The message, or null for an empty buffer
 * @throws {ProtocolError} If the bytes are not a valid frame
 */
export function decodeFrame(buffer: Uint8Array): Message | null {
  if (buffer.length === 0) {
    return null;
  }

  const header = readHeader(buffer);

  if (header.version !== PROTOCOL_VERSION) {
    throw new UnsupportedVersionError(header.version, buffer.length);
  }
  if (!isMessageKind(header.kind)) {
    throw new InvalidFrameError(
      `Unknown message kind: ${header.kind}`,
      buffer.length
    );
  }
  if (header.flags !== FLAG_UTF8_TEXT) {
    throw new InvalidFrameError(
      `Unsupported flags: 0b${header.flags.toString(2).padStart(8, "0")}`,
      buffer.length
    );
  }

  let body: string;
  try {
    body = utf8.decode(buffer.subarray(HEADER_SIZE));
  } catch (err) {
    throw new InvalidFrameError(
      `Invalid UTF-8 payload: ${err instanceof Error ? err.message : err}`,
      buffer.length,
      { cause: err }
    );
  }

  return createMessage(header.kind, body);
}

/**
 * Read the header fields without validating them
 */
export function readHeader(buffer: Uint8Array): FrameHeader {
  if (buffer.length < HEADER_SIZE) {
    throw new InvalidFrameError(
      `Frame too short: expected at least ${HEADER_SIZE} bytes, got ${buffer.length}`,
      buffer.length
    );
  }

  return {
    version: buffer[0] ?? 0,
    kind: buffer[1] ?? 0,
    flags: buffer[2] ?? 0,
  };
}

function failed(error: InvalidMessageError): EncodedFrame {
  return { buffer: Buffer.alloc(0), error };
}
