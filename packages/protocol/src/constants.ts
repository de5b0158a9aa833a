/**
 * Protocol Constants
 *
 * Defines message kinds, flags, and frame parameters.
 */

// Protocol version
export const PROTOCOL_VERSION = 1;

// Frame structure sizes
export const HEADER_SIZE = 3; // version(1) + kind(1) + flags(1)
export const MAX_FRAME_SIZE = 65507; // largest UDP payload over IPv4

// Message Kinds (1 byte)
export enum MessageKind {
  INFO = 0x01,
  AHEAD = 0x02,
  BEHIND = 0x03,
  UP_TO_DATE = 0x04,
}

// Flags (bitmask)
export const FLAG_UTF8_TEXT = 0b00000001; // Payload is UTF-8 text
