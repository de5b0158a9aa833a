/**
 * Message model
 *
 * Construction and display of the values carried by frames.
 */

import { MessageKind } from "./constants.js";
import type { Message } from "./types.js";

const KIND_LABELS: Record<MessageKind, string> = {
  [MessageKind.INFO]: "Info",
  [MessageKind.AHEAD]: "Ahead",
  [MessageKind.BEHIND]: "Behind",
  [MessageKind.UP_TO_DATE]: "Up to date",
};

/**
 * Check whether a raw kind byte names a known message kind
 */
export function isMessageKind(value: number): value is MessageKind {
  return Object.prototype.hasOwnProperty.call(KIND_LABELS, value);
}

/**
 * Create a frozen message
 */
export function createMessage(kind: MessageKind, body: string = ""): Message {
  return Object.freeze({ kind, body });
}

/**
 * The message used where no content exists
 */
export function defaultMessage(): Message {
  return createMessage(MessageKind.INFO);
}

/**
 * Build an INFO message carrying the chunk's text
 */
export function messageFromChunk(chunk: Buffer): Message {
  return createMessage(MessageKind.INFO, chunk.toString("utf8"));
}

/**
 * Ignore the chunk and emit the default message (keep-alive pulses)
 */
export function pulseMessage(_chunk: Buffer): Message {
  return defaultMessage();
}

/**
 * Human-readable form, e.g. "Ahead: 2 commits"
 */
export function formatMessage(message: Message): string {
  const label = KIND_LABELS[message.kind];
  return message.body.length > 0 ? `${label}: ${message.body}` : label;
}
