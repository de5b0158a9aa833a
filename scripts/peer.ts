#!/usr/bin/env tsx
/**
 * Loopback Peer
 *
 * A remote end to point wirecat at while developing.
 * - Prints every frame it receives
 * - Answers each frame with one message of every kind
 *
 * Usage: tsx scripts/peer.ts [port] [--udp]
 */

import { createServer, Socket } from "net";
import { createSocket } from "dgram";
import { setTimeout as delay } from "timers/promises";
import { encodeFrame, decodeFrame } from "../packages/protocol/src/frame.js";
import { MessageKind } from "../packages/protocol/src/constants.js";
import {
  createMessage,
  formatMessage,
} from "../packages/protocol/src/message.js";
import type { Message } from "../packages/protocol/src/types.js";

// Configuration
const CONFIG = {
  host: "127.0.0.1",
  port: parseInt(process.argv.find((arg) => /^\d+$/.test(arg)) ?? "8080", 10),
  udp: process.argv.includes("--udp"),
};

const REPLIES: Message[] = [
  createMessage(MessageKind.INFO, "peer online"),
  createMessage(MessageKind.AHEAD, "2 commits"),
  createMessage(MessageKind.BEHIND, "1 commit"),
  createMessage(MessageKind.UP_TO_DATE),
];

/**
 * Describe one received frame
 */
function describe(frame: Buffer): string {
  try {
    const message = decodeFrame(frame);
    return message ? formatMessage(message) : "(empty)";
  } catch (err) {
    return `malformed frame: ${err instanceof Error ? err.message : err}`;
  }
}

function encodeReplies(): Buffer[] {
  return REPLIES.map((message) => encodeFrame(message).buffer);
}

/**
 * Write frames one at a time with a pause between them, since the
 * receiver treats each read as exactly one frame
 */
async function writePaced(socket: Socket, frames: Buffer[]): Promise<void> {
  for (const frame of frames) {
    if (socket.destroyed) return;
    socket.write(frame);
    await delay(50);
  }
}

function runStreamPeer(): void {
  const server = createServer((socket: Socket) => {
    const from = `${socket.remoteAddress}:${socket.remotePort}`;
    console.log(`🔌 ${from} connected`);

    socket.on("data", (chunk: Buffer) => {
      console.log(`📦 [${from}] ${describe(chunk)}`);
      writePaced(socket, encodeReplies()).catch((err) => {
        console.error(` [${from}] reply failed: ${err.message}`);
      });
    });

    socket.on("close", () => console.log(`👋 ${from} disconnected`));
    socket.on("error", (err) => console.error(` [${from}] ${err.message}`));
  });

  server.listen(CONFIG.port, CONFIG.host, () => {
    console.log(`TCP peer listening on ${CONFIG.host}:${CONFIG.port}`);
  });
}

function runDatagramPeer(): void {
  const socket = createSocket("udp4");

  socket.on("message", (frame, rinfo) => {
    const from = `${rinfo.address}:${rinfo.port}`;
    console.log(`📦 [${from}] ${describe(frame)}`);
    for (const reply of encodeReplies()) {
      socket.send(reply, rinfo.port, rinfo.address);
    }
  });

  socket.on("error", (err) => console.error(` ${err.message}`));

  socket.bind(CONFIG.port, CONFIG.host, () => {
    console.log(`UDP peer listening on ${CONFIG.host}:${CONFIG.port}`);
  });
}

if (CONFIG.udp) {
  runDatagramPeer();
} else {
  runStreamPeer();
}
