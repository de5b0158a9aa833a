import { HandoffClosedError } from "./errors.js";

type PendingSend<T> = {
  value: T;
  resolve: () => void;
  reject: (err: Error) => void;
};

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * HandoffQueue is a zero-capacity channel.
 *
 * send() resolves only once a receiver has taken the value, so a producer
 * that awaits each send never runs ahead of its consumer. Single producer,
 * single consumer.
 *
 * Closing wakes waiting receivers with `done` and rejects waiting senders
 * with HandoffClosedError.
 */
export class HandoffQueue<T> implements AsyncIterable<T> {
  private senders: PendingSend<T>[] = [];
  private receivers: PendingReceive<T>[] = [];
  private closed: boolean = false;

  /**
   * Hand a value to the consumer
   */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new HandoffClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Take the next value, waiting for a producer if none is parked
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Close the queue (idempotent)
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new HandoffClosedError());
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of producers blocked in send()
   */
  pendingSends(): number {
    return this.senders.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
