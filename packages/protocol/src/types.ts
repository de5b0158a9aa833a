/**
 * Protocol Type Definitions
 */

import type { MessageKind } from "./constants.js";
import type { ProtocolError } from "./errors.js";

/**
 * One application message. Never mutated after creation.
 */
export type Message = {
  readonly kind: MessageKind;
  readonly body: string;
};

/**
 * Header fields as they appear on the wire
 */
export type FrameHeader = {
  version: number; // Protocol version
  kind: number; // Raw message kind byte
  flags: number; // Flags bitmask
};

/**
 * Frame encoding result
 *
 * `buffer` is empty when the message could not be serialized, in which case
 * `error` says why.
 */
export type EncodedFrame = {
  buffer: Buffer;
  error: ProtocolError | null;
};
