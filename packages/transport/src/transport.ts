/**
 * Transport selection
 *
 * Exactly two transports exist, so a session is a closed union
 * discriminated by `kind` rather than an open plugin interface.
 */

import {
  DatagramSession,
  openDatagramSession,
} from "./datagram/datagramTransport.js";
import { StreamSession, openStreamSession } from "./stream/streamTransport.js";
import type { DiagnosticLogger, Endpoint, OutboundSource } from "./types.js";

export type TransportKind = "stream" | "datagram";

export type TransportSession = StreamSession | DatagramSession;

export interface TransportOptions {
  logger: DiagnosticLogger;
  /** Stream only: connect timeout in milliseconds */
  connectTimeout?: number;
}

/**
 * Open a session of the requested kind and start forwarding `outbound`
 *
 * @throws {TransportError} CONNECTION_FAILED (stream) or BIND_FAILED (datagram)
 */
export function openTransport(
  kind: TransportKind,
  endpoint: Endpoint,
  outbound: OutboundSource,
  options: TransportOptions
): Promise<TransportSession> {
  switch (kind) {
    case "stream":
      return openStreamSession(endpoint, outbound, options);
    case "datagram":
      return openDatagramSession(endpoint, outbound, {
        logger: options.logger,
      });
  }
}

export function transportKindFor(udp: boolean): TransportKind {
  return udp ? "datagram" : "stream";
}
