import { encodeFrame, decodeFrame } from "../../protocol/src/frame.js";
import { ProtocolError } from "../../protocol/src/errors.js";
import type { Message } from "../../protocol/src/types.js";
import type { DiagnosticLogger } from "./types.js";

/**
 * Encode a message, logging and returning null when it cannot be serialized.
 * Nothing goes on the wire for such a message.
 */
export function encodeOrReport(
  message: Message,
  logger: DiagnosticLogger
): Buffer | null {
  const { buffer, error } = encodeFrame(message);
  if (error) {
    logger.warn(`Dropping outbound message: ${error.message}`, {
      kind: message.kind,
    });
    return null;
  }
  return buffer;
}

/**
 * Decode one read as one frame. Malformed frames are reported and dropped;
 * empty reads produce nothing.
 */
export function decodeOrReport(
  frame: Uint8Array,
  logger: DiagnosticLogger
): Message | null {
  try {
    return decodeFrame(frame);
  } catch (err) {
    if (err instanceof ProtocolError) {
      logger.warn(`Dropping malformed frame: ${err.message}`, {
        size: frame.length,
      });
      return null;
    }
    throw err;
  }
}
