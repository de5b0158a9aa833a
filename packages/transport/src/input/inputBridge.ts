import type { Readable } from "stream";
import { messageFromChunk } from "../../../protocol/src/message.js";
import type { Message } from "../../../protocol/src/types.js";
import { HandoffQueue } from "../handoff.js";
import { HandoffClosedError, errorMessage } from "../errors.js";
import type { DiagnosticLogger } from "../types.js";

export const INPUT_CHUNK_SIZE = 1024;

export interface InputBridgeOptions {
  logger: DiagnosticLogger;
  /** Largest piece handed over per message (default 1024 bytes) */
  chunkSize?: number;
  /** Turns one input chunk into the message sent for it */
  toMessage?: (chunk: Buffer) => Message;
}

/**
 * InputBridge turns the local input stream into messages on a handoff queue.
 *
 * Responsibilities:
 * - Read the source in bounded chunks on its own task, never splitting a
 *   UTF-8 character between two messages
 * - Publish one message per chunk, waiting for the transport to take it
 * - Close the queue on end-of-input or read error (never retries)
 *
 * While a send is pending the loop pulls nothing more from the source, so
 * the source's own buffer caps what is held in memory.
 */
export class InputBridge {
  public readonly messages: HandoffQueue<Message> = new HandoffQueue();
  private readonly logger: DiagnosticLogger;
  private readonly chunkSize: number;
  private readonly toMessage: (chunk: Buffer) => Message;
  private source: Readable | null = null;
  private stopped: boolean = false;
  private chunksRead: number = 0;
  // Start of a UTF-8 sequence the last read cut short
  private carry: Buffer = Buffer.alloc(0);

  constructor(options: InputBridgeOptions) {
    this.logger = options.logger;
    this.chunkSize = options.chunkSize ?? INPUT_CHUNK_SIZE;
    this.toMessage = options.toMessage ?? messageFromChunk;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new RangeError(`Invalid chunk size: ${this.chunkSize}`);
    }
  }

  /**
   * Run the read loop until the input ends. Never rejects.
   */
  async start(source: Readable): Promise<void> {
    if (this.source) {
      throw new Error("InputBridge already started");
    }
    this.source = source;

    try {
      for await (const chunk of source) {
        for (const piece of this.split(toBuffer(chunk))) {
          await this.publish(piece);
        }
      }
      if (this.carry.length > 0) {
        await this.publish(this.carry);
      }
      this.logger.debug("Input ended", { chunks: this.chunksRead });
    } catch (err) {
      if (this.stopped || err instanceof HandoffClosedError) {
        this.logger.debug("Input bridge stopped", { chunks: this.chunksRead });
      } else {
        this.logger.warn(`Input read failed: ${errorMessage(err)}`);
      }
    } finally {
      this.messages.close();
    }
  }

  /**
   * Stop reading and release the consumer
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.messages.close();
    this.source?.destroy();
  }

  /**
   * Number of chunks read so far
   */
  getChunksRead(): number {
    return this.chunksRead;
  }

  private async publish(piece: Buffer): Promise<void> {
    this.chunksRead++;
    await this.messages.send(this.toMessage(piece));
  }

  /**
   * Cut a read into pieces of at most chunkSize bytes, ending each piece on
   * a UTF-8 character boundary. A partial character at the end of the read
   * is held back and prefixed to the next one.
   */
  private *split(chunk: Buffer): Generator<Buffer> {
    const bytes =
      this.carry.length > 0 ? Buffer.concat([this.carry, chunk]) : chunk;
    const usable = completeLength(bytes);
    this.carry = Buffer.from(bytes.subarray(usable));

    let offset = 0;
    while (offset < usable) {
      const limit = offset + this.chunkSize;
      const end = limit >= usable ? usable : boundaryBefore(bytes, limit, offset);
      yield bytes.subarray(offset, end);
      offset = end;
    }
  }
}

const MAX_CONTINUATION_BYTES = 3;

function isContinuation(byte: number): boolean {
  return (byte & 0b1100_0000) === 0b1000_0000;
}

function sequenceWidth(lead: number): number {
  if (lead >= 0xf0 && lead <= 0xf7) return 4;
  if (lead >= 0xe0) return lead <= 0xef ? 3 : 1;
  if (lead >= 0xc0) return 2;
  return 1;
}

/**
 * Length of `bytes` without a trailing incomplete UTF-8 sequence.
 * Bytes that are not UTF-8 at all are kept.
 */
export function completeLength(bytes: Uint8Array): number {
  const floor = Math.max(0, bytes.length - 1 - MAX_CONTINUATION_BYTES);
  let lead = bytes.length - 1;
  while (lead >= floor && isContinuation(bytes[lead] ?? 0)) lead--;
  if (lead < floor) return bytes.length;

  const width = sequenceWidth(bytes[lead] ?? 0);
  return lead + width > bytes.length ? lead : bytes.length;
}

/**
 * Move a cut at `limit` back to the start of the character it would split,
 * staying above `floor`
 */
function boundaryBefore(bytes: Uint8Array, limit: number, floor: number): number {
  let cut = limit;
  for (
    let step = 0;
    step < MAX_CONTINUATION_BYTES && cut > floor && isContinuation(bytes[cut] ?? 0);
    step++
  ) {
    cut--;
  }
  return cut === floor || isContinuation(bytes[cut] ?? 0) ? limit : cut;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError("Input stream must yield bytes or strings");
}
