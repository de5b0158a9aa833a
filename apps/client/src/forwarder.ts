import type { Readable, Writable } from "stream";
import {
  formatMessage,
  messageFromChunk,
  pulseMessage,
} from "../../../packages/protocol/src/message.js";
import type { Message } from "../../../packages/protocol/src/types.js";
import { InputBridge } from "../../../packages/transport/src/input/inputBridge.js";
import { openTransport } from "../../../packages/transport/src/transport.js";
import type {
  TransportKind,
  TransportSession,
} from "../../../packages/transport/src/transport.js";
import { formatEndpoint } from "../../../packages/transport/src/endpoint.js";
import {
  TransportError,
  errorMessage,
} from "../../../packages/transport/src/errors.js";
import type {
  Endpoint,
  SessionStats,
} from "../../../packages/transport/src/types.js";
import type { Logger } from "./observability/logger.js";

export interface ForwarderOptions {
  endpoint: Endpoint;
  transport: TransportKind;
  input: Readable;
  output: Writable;
  logger: Logger;
  /** Send a default message per input chunk instead of the chunk's text */
  pulse?: boolean;
  connectTimeout?: number;
  /** Closes the session when aborted; the forwarder then resolves normally */
  signal?: AbortSignal;
}

export type ForwarderResult = {
  messagesWritten: number;
  stats: SessionStats;
};

/**
 * Forward input to the remote peer and every received message to `output`.
 *
 * Resolves when the peer's stream ends or `signal` aborts; rejects with the
 * session's TransportError. Both directions are shut down before it settles.
 */
export async function runForwarder(
  options: ForwarderOptions
): Promise<ForwarderResult> {
  const { endpoint, transport, logger } = options;

  const bridge = new InputBridge({
    logger,
    toMessage: options.pulse ? pulseMessage : messageFromChunk,
  });
  const inputDone = bridge.start(options.input);

  let session: TransportSession;
  try {
    session = await openTransport(
      transport,
      endpoint,
      traceOutbound(bridge.messages, logger),
      {
        logger,
        connectTimeout: options.connectTimeout,
      }
    );
  } catch (err) {
    bridge.stop();
    await inputDone;
    throw err;
  }

  logger.info(`Forwarding to ${formatEndpoint(endpoint)} over ${transport}`);

  const onAbort = () => {
    logger.info("Interrupted, closing session");
    session.close().catch((err) => {
      logger.error(`Close failed: ${errorMessage(err)}`);
    });
  };
  if (options.signal?.aborted) {
    onAbort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }

  let messagesWritten = 0;
  try {
    for await (const message of session.inbound) {
      logger.frame("←", message);
      await writeMessage(options.output, message);
      messagesWritten++;
    }
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
    bridge.stop();
    await session.close();
    await Promise.all([inputDone, session.forwarding]);
    logger.debug("Session closed", { messagesWritten, ...session.getStats() });
  }

  return { messagesWritten, stats: session.getStats() };
}

/**
 * Log each outbound message as the transport takes it. Pulls from `source`
 * only when asked, so the handoff stays a rendezvous.
 */
async function* traceOutbound(
  source: AsyncIterable<Message>,
  logger: Logger
): AsyncGenerator<Message, void, undefined> {
  for await (const message of source) {
    logger.frame("→", message);
    yield message;
  }
}

/**
 * Write one message in the console format and wait for it to flush
 */
export function writeMessage(output: Writable, message: Message): Promise<void> {
  const text = `New Message\n${formatMessage(message)}\n`;

  return new Promise((resolve, reject) => {
    output.write(text, (err) => {
      if (err) {
        reject(
          new TransportError(
            `Failed to write output: ${err.message}`,
            "OUTPUT_FAILED",
            { cause: err }
          )
        );
        return;
      }
      resolve();
    });
  });
}
