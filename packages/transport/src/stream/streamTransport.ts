import { Socket, connect } from "net";
import type { NetConnectOpts } from "net";
import type { Message } from "../../../protocol/src/types.js";
import { TransportError, errorMessage } from "../errors.js";
import { formatEndpoint } from "../endpoint.js";
import { decodeOrReport, encodeOrReport } from "../framing.js";
import { readChunks } from "./readChunks.js";
import type {
  DiagnosticLogger,
  Endpoint,
  OutboundSource,
  SessionStats,
} from "../types.js";

export enum StreamState {
  CONNECTING = "CONNECTING",
  CONNECTED = "CONNECTED",
  FORWARDING = "FORWARDING",
  CLOSED = "CLOSED",
}

export type StreamStats = SessionStats & {
  state: StreamState;
};

export interface StreamSessionOptions {
  logger: DiagnosticLogger;
  /** Give up connecting after this many milliseconds (default: never) */
  connectTimeout?: number;
  /** Socket factory (default: net.connect) */
  createConnection?: (options: NetConnectOpts) => Socket;
}

/**
 * StreamSession is one TCP connection to the remote peer.
 *
 * Responsibilities:
 * - Connect, then run the outbound task and the inbound sequence concurrently
 * - Frame every socket read as exactly one message
 * - Turn write failures into an error on the inbound sequence
 * - State machine enforcement (CONNECTING → CONNECTED → FORWARDING → CLOSED)
 *
 * Does NOT:
 * - Retry or reconnect
 * - Reassemble frames split across reads
 */
export class StreamSession {
  public readonly kind = "stream" as const;
  public readonly endpoint: Endpoint;
  public readonly inbound: AsyncIterable<Message>;

  private socket: Socket | null = null;
  private state: StreamState = StreamState.CONNECTING;
  private readonly logger: DiagnosticLogger;
  private readonly connectTimeout: number | undefined;
  private readonly createConnection: (options: NetConnectOpts) => Socket;
  private failure: TransportError | null = null;
  private consumed: boolean = false;
  private forwardTask: Promise<void> = Promise.resolve();

  // Statistics
  private stats: SessionStats = {
    bytesSent: 0,
    bytesReceived: 0,
    framesSent: 0,
    framesReceived: 0,
    framesDropped: 0,
  };

  constructor(endpoint: Endpoint, options: StreamSessionOptions) {
    this.endpoint = endpoint;
    this.logger = options.logger;
    this.connectTimeout = options.connectTimeout;
    this.createConnection = options.createConnection ?? connect;
    this.inbound = {
      [Symbol.asyncIterator]: () => this.receive(),
    };
  }

  /**
   * Connect and start forwarding `outbound` to the peer
   *
   * @throws {TransportError} code=CONNECTION_FAILED
   */
  async open(outbound: OutboundSource): Promise<void> {
    if (this.state !== StreamState.CONNECTING || this.socket) {
      throw new Error(`Cannot open session in state ${this.state}`);
    }

    let socket: Socket;
    try {
      socket = await this.connectSocket();
    } catch (err) {
      this.transition(StreamState.CLOSED, "connect failed");
      throw err;
    }

    this.socket = socket;
    this.wireSocket(socket);
    this.transition(StreamState.CONNECTED);

    this.forwardTask = this.forward(socket, outbound);
    this.transition(StreamState.FORWARDING);
  }

  /**
   * Settles once the outbound task has stopped. Never rejects; write
   * failures surface through `inbound`.
   */
  get forwarding(): Promise<void> {
    return this.forwardTask;
  }

  /**
   * Close the connection (idempotent)
   */
  async close(): Promise<void> {
    if (this.state === StreamState.CLOSED) return;

    this.socket?.destroy();
    this.transition(StreamState.CLOSED, "closed locally");
  }

  /**
   * Get current session state
   */
  getState(): StreamState {
    return this.state;
  }

  /**
   * Get session statistics, including the current state
   */
  getStats(): StreamStats {
    return { ...this.stats, state: this.state };
  }

  private connectSocket(): Promise<Socket> {
    const target = formatEndpoint(this.endpoint);
    this.logger.debug(`Connecting to ${target}`);

    return new Promise((resolve, reject) => {
      const socket = this.createConnection({
        host: this.endpoint.address,
        port: this.endpoint.port,
        family: this.endpoint.family === "IPv4" ? 4 : 6,
      });

      const onError = (err: Error) => {
        socket.destroy();
        reject(
          new TransportError(
            `Failed to connect to ${target}: ${err.message}`,
            "CONNECTION_FAILED",
            { cause: err }
          )
        );
      };

      socket.once("error", onError);

      if (this.connectTimeout !== undefined) {
        const timeout = this.connectTimeout;
        socket.setTimeout(timeout, () => {
          onError(new Error(`timed out after ${timeout}ms`));
        });
      }

      socket.once("connect", () => {
        socket.off("error", onError);
        socket.setTimeout(0);
        resolve(socket);
      });
    });
  }

  /**
   * Bind socket events to session state
   */
  private wireSocket(socket: Socket): void {
    // Keeps errors raised while nobody iterates from going uncaught
    socket.on("error", (err) => {
      this.logger.debug(`Socket error: ${err.message}`);
    });

    socket.on("close", () => {
      if (this.state !== StreamState.CLOSED) {
        this.transition(StreamState.CLOSED, "socket closed");
      }
    });
  }

  /**
   * Outbound task: encode and write every message, then half-close
   */
  private async forward(socket: Socket, outbound: OutboundSource): Promise<void> {
    try {
      for await (const message of outbound) {
        const buffer = encodeOrReport(message, this.logger);
        if (!buffer) {
          this.stats.framesDropped++;
          continue;
        }
        await this.write(socket, buffer);
      }

      if (this.state !== StreamState.CLOSED) {
        this.logger.debug("Outbound finished, half-closing connection");
        socket.end();
      }
    } catch (err) {
      this.fail(socket, err instanceof TransportError ? err : writeFailure(err));
    }
  }

  private write(socket: Socket, buffer: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.write(buffer, (err) => {
        if (err) {
          // Recorded before the socket's own error reaches the reader
          reject(this.fail(socket, writeFailure(err)));
          return;
        }
        this.stats.bytesSent += buffer.length;
        this.stats.framesSent++;
        resolve();
      });
    });
  }

  /**
   * Inbound sequence: every read is one frame
   */
  private async *receive(): AsyncGenerator<Message, void, undefined> {
    if (this.consumed) {
      throw new Error("Inbound stream already consumed");
    }
    this.consumed = true;

    const socket = this.socket;
    if (!socket) {
      throw new Error("Session is not open");
    }

    try {
      for await (const bytes of readChunks(socket)) {
        this.stats.bytesReceived += bytes.length;

        const message = decodeOrReport(bytes, this.logger);
        if (!message) {
          if (bytes.length > 0) this.stats.framesDropped++;
          continue;
        }

        this.stats.framesReceived++;
        yield message;
      }
    } catch (err) {
      if (this.failure) throw this.failure;
      throw new TransportError(
        `Failed to read from socket: ${errorMessage(err)}`,
        "READ_FAILED",
        { cause: err }
      );
    }

    if (this.failure) throw this.failure;
  }

  private fail(socket: Socket, error: TransportError): TransportError {
    if (this.failure) return this.failure;
    this.failure = error;
    this.logger.debug(error.message);
    socket.destroy(error);
    return error;
  }

  /**
   * Transition to a new state
   */
  private transition(next: StreamState, reason?: string): void {
    if (this.state === next) return;

    if (!this.isTransitionAllowed(this.state, next)) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.logger.debug(
      `State: ${this.state} → ${next}`,
      reason ? { reason } : undefined
    );
    this.state = next;
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(from: StreamState, to: StreamState): boolean {
    const transitions: Record<StreamState, StreamState[]> = {
      [StreamState.CONNECTING]: [StreamState.CONNECTED, StreamState.CLOSED],
      [StreamState.CONNECTED]: [StreamState.FORWARDING, StreamState.CLOSED],
      [StreamState.FORWARDING]: [StreamState.CLOSED],
      [StreamState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }
}

function writeFailure(err: unknown): TransportError {
  return new TransportError(
    `Failed to write to socket: ${errorMessage(err)}`,
    "WRITE_FAILED",
    { cause: err }
  );
}

/**
 * Connect to `endpoint` and start forwarding `outbound` over TCP
 *
 * @throws {TransportError} code=CONNECTION_FAILED
 */
export async function openStreamSession(
  endpoint: Endpoint,
  outbound: OutboundSource,
  options: StreamSessionOptions
): Promise<StreamSession> {
  const session = new StreamSession(endpoint, options);
  await session.open(outbound);
  return session;
}
