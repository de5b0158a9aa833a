import { describe, it, expect, afterEach, vi } from "vitest";
import { PassThrough, Readable, Writable } from "stream";
import type { Socket } from "net";
import { runForwarder, writeMessage } from "../src/forwarder.js";
import { encodeFrame } from "../../../packages/protocol/src/frame.js";
import { MessageKind } from "../../../packages/protocol/src/constants.js";
import { createMessage } from "../../../packages/protocol/src/message.js";
import {
  bindUdp,
  closeUdp,
  listenTcp,
  nextDatagram,
  sendTo,
  unusedTcpEndpoint,
} from "../../../packages/transport/test/helpers.js";
import type { TcpPeer } from "../../../packages/transport/test/helpers.js";
import { Logger, LogLevel } from "../src/observability/logger.js";
import { createCapture, createQuietLogger } from "./helpers.js";

function collectUntilEnd(socket: Socket): Promise<Buffer> {
  return new Promise((resolve) => {
    const parts: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => parts.push(chunk));
    socket.on("end", () => resolve(Buffer.concat(parts)));
  });
}

describe("runForwarder()", () => {
  let peer: TcpPeer | null = null;

  afterEach(async () => {
    await peer?.close();
    peer = null;
  });

  it("should send one input line as exactly one frame", async () => {
    peer = await listenTcp();
    const received = peer.accepted.then(collectUntilEnd);
    const output = createCapture();

    const result = await runForwarder({
      endpoint: peer.endpoint,
      transport: "stream",
      input: Readable.from([Buffer.from("hello\n")]),
      output: output.stream,
      logger: createQuietLogger(),
    });

    expect(await received).toEqual(
      encodeFrame(createMessage(MessageKind.INFO, "hello\n")).buffer
    );
    expect(result.messagesWritten).toBe(0);
    expect(result.stats.framesSent).toBe(1);
    expect(output.text()).toBe("");
  });

  it("should log messages in both directions at debug level", async () => {
    peer = await listenTcp();
    void peer.accepted.then((socket) => {
      socket.on("data", () => {
        socket.end(encodeFrame(createMessage(MessageKind.AHEAD, "2 commits")).buffer);
      });
    });
    const lines: string[] = [];
    const logger = new Logger({
      level: LogLevel.DEBUG,
      stream: { write: (chunk: string) => lines.push(chunk) },
      clock: () => new Date("2026-01-02T03:04:05.000Z"),
    });

    const input = new PassThrough();
    input.write("hello\n");
    await runForwarder({
      endpoint: peer.endpoint,
      transport: "stream",
      input,
      output: createCapture().stream,
      logger,
    });

    expect(lines).toContain(
      '[2026-01-02T03:04:05.000Z] [DEBUG] → Message {"kind":"INFO","bodySize":"6B"}\n'
    );
    expect(lines).toContain(
      '[2026-01-02T03:04:05.000Z] [DEBUG] ← Message {"kind":"AHEAD","bodySize":"9B"}\n'
    );
  });

  it("should print every received message until the peer closes", async () => {
    peer = await listenTcp();
    const frames = [
      encodeFrame(createMessage(MessageKind.INFO, "first")).buffer,
      encodeFrame(createMessage(MessageKind.AHEAD, "second")).buffer,
    ];

    let remote: Socket | null = null;
    const output = createCapture((count) => {
      // Next frame only once the previous one has been printed
      if (count < frames.length) {
        remote?.write(frames[count]);
      } else {
        remote?.end();
      }
    });

    void peer.accepted.then((socket) => {
      remote = socket;
      socket.write(frames[0]);
    });

    const input = new PassThrough();
    const result = await runForwarder({
      endpoint: peer.endpoint,
      transport: "stream",
      input,
      output: output.stream,
      logger: createQuietLogger(),
    });

    expect(output.chunks).toEqual([
      "New Message\nInfo: first\n",
      "New Message\nAhead: second\n",
    ]);
    expect(result.messagesWritten).toBe(2);
    expect(input.destroyed).toBe(true);
  });

  it("should fail and release input when the connection is refused", async () => {
    const endpoint = await unusedTcpEndpoint();
    const input = new PassThrough();

    await expect(
      runForwarder({
        endpoint,
        transport: "stream",
        input,
        output: createCapture().stream,
        logger: createQuietLogger(),
      })
    ).rejects.toMatchObject({ code: "CONNECTION_FAILED" });

    expect(input.destroyed).toBe(true);
  });

  it("should fail when the output cannot be written", async () => {
    peer = await listenTcp();
    void peer.accepted.then((socket) => {
      socket.write(encodeFrame(createMessage(MessageKind.BEHIND)).buffer);
    });

    const errors: Error[] = [];
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });
    output.on("error", (err) => errors.push(err));

    await expect(
      runForwarder({
        endpoint: peer.endpoint,
        transport: "stream",
        input: new PassThrough(),
        output,
        logger: createQuietLogger(),
      })
    ).rejects.toMatchObject({
      code: "OUTPUT_FAILED",
      message: "Failed to write output: EPIPE",
    });
  });

  it("should exchange datagrams and stop when aborted", async () => {
    const remote = await bindUdp();
    const controller = new AbortController();
    const output = createCapture();
    const input = new PassThrough();

    try {
      const arrival = nextDatagram(remote.socket);
      const forwarding = runForwarder({
        endpoint: remote.endpoint,
        transport: "datagram",
        input,
        output: output.stream,
        logger: createQuietLogger(),
        signal: controller.signal,
      });

      input.write("ping");
      const { frame, port } = await arrival;
      expect(frame).toEqual(
        encodeFrame(createMessage(MessageKind.INFO, "ping")).buffer
      );

      await sendTo(
        remote.socket,
        encodeFrame(createMessage(MessageKind.UP_TO_DATE)).buffer,
        { address: "127.0.0.1", port, family: "IPv4" }
      );
      await vi.waitFor(() => expect(output.chunks).toHaveLength(1));

      controller.abort();
      const result = await forwarding;

      expect(output.text()).toBe("New Message\nUp to date\n");
      expect(result.messagesWritten).toBe(1);
    } finally {
      await closeUdp(remote.socket);
    }
  });

  it("should send default messages in pulse mode", async () => {
    const remote = await bindUdp();
    const controller = new AbortController();
    const input = new PassThrough();

    try {
      const arrival = nextDatagram(remote.socket);
      const forwarding = runForwarder({
        endpoint: remote.endpoint,
        transport: "datagram",
        input,
        output: createCapture().stream,
        logger: createQuietLogger(),
        pulse: true,
        signal: controller.signal,
      });

      input.write("anything at all");
      const { frame } = await arrival;
      expect([...frame]).toEqual([0x01, 0x01, 0x01]);

      controller.abort();
      await forwarding;
    } finally {
      await closeUdp(remote.socket);
    }
  });
});

describe("writeMessage()", () => {
  it("should print the header line and the formatted message", async () => {
    const output = createCapture();

    await writeMessage(output.stream, createMessage(MessageKind.BEHIND, "1 commit"));

    expect(output.text()).toBe("New Message\nBehind: 1 commit\n");
  });
});
