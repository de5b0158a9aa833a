/**
 * Transport Type Definitions
 */

import type { Message } from "../../protocol/src/types.js";

/**
 * Logging surface the transports report through.
 * The client app supplies its Logger; tests supply spies.
 */
export interface DiagnosticLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export type AddressFamily = "IPv4" | "IPv6";

/**
 * A resolved remote or local socket address
 */
export type Endpoint = {
  readonly address: string;
  readonly port: number;
  readonly family: AddressFamily;
};

/**
 * A frame paired with the address it was sent to or received from
 */
export type DatagramEnvelope = {
  readonly endpoint: Endpoint;
  readonly frame: Buffer;
};

/**
 * Counters kept by every session
 */
export type SessionStats = {
  bytesSent: number;
  bytesReceived: number;
  framesSent: number;
  framesReceived: number;
  framesDropped: number;
};

/**
 * Messages headed for the remote peer
 */
export type OutboundSource = AsyncIterable<Message>;
