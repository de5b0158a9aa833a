import { createSocket, Socket, RemoteInfo } from "dgram";
import { on } from "events";
import type { Message } from "../../../protocol/src/types.js";
import { TransportError, errorMessage } from "../errors.js";
import {
  createEndpointMatcher,
  formatEndpoint,
  wildcardFor,
} from "../endpoint.js";
import { decodeOrReport, encodeOrReport } from "../framing.js";
import type {
  DatagramEnvelope,
  DiagnosticLogger,
  Endpoint,
  OutboundSource,
  SessionStats,
} from "../types.js";

export type DatagramStats = SessionStats & {
  /** Datagrams discarded because they came from another address */
  datagramsFiltered: number;
};

export interface DatagramSessionOptions {
  logger: DiagnosticLogger;
}

/**
 * DatagramSession exchanges messages with one peer over UDP.
 *
 * Outbound messages become one datagram each, addressed to the remote
 * endpoint. Inbound datagrams from any other source are discarded before
 * decoding. Delivery is whatever UDP gives: unordered, unacknowledged.
 *
 * The inbound sequence only ends when the session is closed.
 */
export class DatagramSession {
  public readonly kind = "datagram" as const;
  public readonly endpoint: Endpoint;
  public readonly inbound: AsyncIterable<Message>;

  private socket: Socket | null = null;
  private events: AsyncIterableIterator<unknown[]> | null = null;
  private readonly abort = new AbortController();
  private readonly logger: DiagnosticLogger;
  private readonly isRemote: (address: string, port: number) => boolean;
  private failure: TransportError | null = null;
  private consumed: boolean = false;
  private closed: boolean = false;
  private forwardTask: Promise<void> = Promise.resolve();

  private stats: DatagramStats = {
    bytesSent: 0,
    bytesReceived: 0,
    framesSent: 0,
    framesReceived: 0,
    framesDropped: 0,
    datagramsFiltered: 0,
  };

  constructor(endpoint: Endpoint, options: DatagramSessionOptions) {
    this.endpoint = endpoint;
    this.logger = options.logger;
    this.isRemote = createEndpointMatcher(endpoint);
    this.inbound = {
      [Symbol.asyncIterator]: () => this.receive(),
    };
  }

  /**
   * Bind an ephemeral local socket and start forwarding `outbound`
   *
   * @throws {TransportError} code=BIND_FAILED
   */
  async open(outbound: OutboundSource): Promise<void> {
    if (this.socket || this.closed) {
      throw new Error("Datagram session already opened");
    }

    const socket = await this.bind();
    this.socket = socket;

    // Keeps errors raised while nobody iterates from going uncaught
    socket.on("error", (err) => {
      this.logger.debug(`Socket error: ${err.message}`);
    });

    // Listen right away so datagrams arriving before iteration are kept
    this.events = on(socket, "message", { signal: this.abort.signal });

    this.logger.debug(`Bound ${formatEndpoint(this.getLocalEndpoint())}`, {
      remote: formatEndpoint(this.endpoint),
    });

    this.forwardTask = this.forward(socket, outbound);
  }

  /**
   * Settles once the outbound task has stopped. Never rejects; send
   * failures surface through `inbound`.
   */
  get forwarding(): Promise<void> {
    return this.forwardTask;
  }

  /**
   * The address the local socket is bound to
   */
  getLocalEndpoint(): Endpoint {
    if (!this.socket) {
      throw new Error("Session is not open");
    }
    const info = this.socket.address();
    return {
      address: info.address,
      port: info.port,
      family: this.endpoint.family,
    };
  }

  /**
   * Close the socket (idempotent)
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.abort.abort();

    const socket = this.socket;
    if (!socket) return;

    await new Promise<void>((resolve) => socket.close(() => resolve()));
    this.logger.debug("Datagram socket closed");
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): DatagramStats {
    return { ...this.stats };
  }

  private bind(): Promise<Socket> {
    const local = wildcardFor(this.endpoint);

    return new Promise((resolve, reject) => {
      const socket = createSocket(
        this.endpoint.family === "IPv4" ? "udp4" : "udp6"
      );

      const onError = (err: Error) => {
        socket.close();
        reject(
          new TransportError(
            `Failed to bind ${formatEndpoint(local)}: ${err.message}`,
            "BIND_FAILED",
            { cause: err }
          )
        );
      };

      socket.once("error", onError);
      socket.bind({ port: local.port, address: local.address }, () => {
        socket.off("error", onError);
        resolve(socket);
      });
    });
  }

  /**
   * Outbound task: one envelope per message, addressed to the remote peer
   */
  private async forward(socket: Socket, outbound: OutboundSource): Promise<void> {
    try {
      for await (const message of outbound) {
        if (this.closed) break;

        const frame = encodeOrReport(message, this.logger);
        if (!frame) {
          this.stats.framesDropped++;
          continue;
        }

        await this.send(socket, { endpoint: this.endpoint, frame });
      }
      this.logger.debug("Outbound finished");
    } catch (err) {
      this.fail(
        new TransportError(
          `Failed to write to socket: ${errorMessage(err)}`,
          "WRITE_FAILED",
          { cause: err }
        )
      );
    }
  }

  private send(socket: Socket, envelope: DatagramEnvelope): Promise<void> {
    const { endpoint, frame } = envelope;

    return new Promise((resolve, reject) => {
      socket.send(frame, endpoint.port, endpoint.address, (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.stats.bytesSent += frame.length;
        this.stats.framesSent++;
        resolve();
      });
    });
  }

  /**
   * Inbound sequence: datagrams from the remote peer, decoded
   */
  private async *receive(): AsyncGenerator<Message, void, undefined> {
    if (this.consumed) {
      throw new Error("Inbound stream already consumed");
    }
    this.consumed = true;

    const events = this.events;
    if (!events) {
      throw new Error("Session is not open");
    }

    try {
      for await (const args of events) {
        const envelope = toEnvelope(args);
        if (!envelope) continue;

        if (!this.isRemote(envelope.endpoint.address, envelope.endpoint.port)) {
          this.stats.datagramsFiltered++;
          continue;
        }

        this.stats.bytesReceived += envelope.frame.length;

        const message = decodeOrReport(envelope.frame, this.logger);
        if (!message) {
          if (envelope.frame.length > 0) this.stats.framesDropped++;
          continue;
        }

        this.stats.framesReceived++;
        yield message;
      }
    } catch (err) {
      if (this.failure) throw this.failure;
      if (this.abort.signal.aborted) return;
      throw new TransportError(
        `Failed to read from socket: ${errorMessage(err)}`,
        "READ_FAILED",
        { cause: err }
      );
    }

    if (this.failure) throw this.failure;
  }

  private fail(error: TransportError): void {
    if (this.failure || this.closed) return;
    this.failure = error;
    this.logger.debug(error.message);
    this.abort.abort(error);
  }
}

function toEnvelope(args: unknown[]): DatagramEnvelope | null {
  const [frame, info] = args;
  if (!Buffer.isBuffer(frame) || !isRemoteInfo(info)) {
    return null;
  }

  return {
    endpoint: {
      address: info.address,
      port: info.port,
      family: info.family === "IPv6" ? "IPv6" : "IPv4",
    },
    frame,
  };
}

function isRemoteInfo(value: unknown): value is RemoteInfo {
  return (
    typeof value === "object" &&
    value !== null &&
    "address" in value &&
    "port" in value &&
    typeof value.address === "string" &&
    typeof value.port === "number"
  );
}

/**
 * Bind a local socket and start forwarding `outbound` over UDP
 *
 * @throws {TransportError} code=BIND_FAILED
 */
export async function openDatagramSession(
  endpoint: Endpoint,
  outbound: OutboundSource,
  options: DatagramSessionOptions
): Promise<DatagramSession> {
  const session = new DatagramSession(endpoint, options);
  await session.open(outbound);
  return session;
}
