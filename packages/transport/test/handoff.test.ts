import { describe, it, expect } from "vitest";
import { HandoffQueue } from "../src/handoff.js";
import { HandoffClosedError } from "../src/errors.js";

describe("HandoffQueue", () => {
  it("should hold a send until a receiver takes the value", async () => {
    const queue = new HandoffQueue<number>();
    let delivered = false;

    const sending = queue.send(1).then(() => {
      delivered = true;
    });
    await Promise.resolve();

    expect(delivered).toBe(false);
    expect(queue.pendingSends()).toBe(1);

    await expect(queue.receive()).resolves.toEqual({ value: 1, done: false });
    await sending;

    expect(delivered).toBe(true);
    expect(queue.pendingSends()).toBe(0);
  });

  it("should complete a send at once when a receiver is waiting", async () => {
    const queue = new HandoffQueue<string>();

    const receiving = queue.receive();
    await queue.send("a");

    await expect(receiving).resolves.toEqual({ value: "a", done: false });
    expect(queue.pendingSends()).toBe(0);
  });

  it("should deliver values in send order", async () => {
    const queue = new HandoffQueue<number>();
    const received: number[] = [];

    const producing = (async () => {
      for (const value of [1, 2, 3]) {
        await queue.send(value);
      }
      queue.close();
    })();

    for await (const value of queue) {
      received.push(value);
    }
    await producing;

    expect(received).toEqual([1, 2, 3]);
  });

  it("should end waiting receivers on close", async () => {
    const queue = new HandoffQueue<number>();

    const receiving = queue.receive();
    queue.close();

    await expect(receiving).resolves.toEqual({ value: undefined, done: true });
    expect(queue.isClosed()).toBe(true);
  });

  it("should reject parked senders on close", async () => {
    const queue = new HandoffQueue<number>();

    const sending = queue.send(7);
    queue.close();

    await expect(sending).rejects.toBeInstanceOf(HandoffClosedError);
    expect(queue.pendingSends()).toBe(0);
  });

  it("should reject sends after close", async () => {
    const queue = new HandoffQueue<number>();
    queue.close();
    queue.close();

    await expect(queue.send(1)).rejects.toThrow("Handoff queue is closed");
    await expect(queue.receive()).resolves.toEqual({
      value: undefined,
      done: true,
    });
  });

  it("should close when the consumer stops iterating", async () => {
    const queue = new HandoffQueue<number>();

    const producing = (async () => {
      await queue.send(1);
      await queue.send(2);
    })();

    for await (const value of queue) {
      expect(value).toBe(1);
      break;
    }

    await expect(producing).rejects.toBeInstanceOf(HandoffClosedError);
    expect(queue.isClosed()).toBe(true);
  });
});
