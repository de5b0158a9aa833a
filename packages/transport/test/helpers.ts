/**
 * Shared fixtures for transport tests. Everything listens on loopback.
 */

import { createServer } from "net";
import type { Server, Socket } from "net";
import { createSocket } from "dgram";
import type { Socket as DatagramSocket } from "dgram";
import { vi } from "vitest";
import type { DiagnosticLogger, Endpoint } from "../src/types.js";

type LogFn = (message: string, meta?: unknown) => void;

export function createTestLogger() {
  return {
    debug: vi.fn<LogFn>(),
    info: vi.fn<LogFn>(),
    warn: vi.fn<LogFn>(),
    error: vi.fn<LogFn>(),
  } satisfies DiagnosticLogger;
}

export type TcpPeer = {
  server: Server;
  endpoint: Endpoint;
  /** Resolves with the first accepted connection */
  accepted: Promise<Socket>;
  /** Destroy open connections and stop listening */
  close(): Promise<void>;
};

export function listenTcp(): Promise<TcpPeer> {
  return new Promise((resolve, reject) => {
    let accept: (socket: Socket) => void = () => undefined;
    const accepted = new Promise<Socket>((resolveSocket) => {
      accept = resolveSocket;
    });

    const sockets = new Set<Socket>();
    const server = createServer((socket) => {
      sockets.add(socket);
      socket.on("close", () => sockets.delete(socket));
      socket.on("error", () => socket.destroy());
      accept(socket);
    });

    const close = () =>
      new Promise<void>((resolveClose) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolveClose());
      });

    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server has no TCP address"));
        return;
      }
      resolve({
        server,
        endpoint: { address: "127.0.0.1", port: address.port, family: "IPv4" },
        accepted,
        close,
      });
    });
  });
}

/**
 * A loopback port with nothing listening on it
 */
export async function unusedTcpEndpoint(): Promise<Endpoint> {
  const peer = await listenTcp();
  await peer.close();
  return peer.endpoint;
}

export type UdpPeer = {
  socket: DatagramSocket;
  endpoint: Endpoint;
};

export function bindUdp(): Promise<UdpPeer> {
  return new Promise((resolve, reject) => {
    const socket = createSocket("udp4");
    socket.once("error", reject);
    socket.bind(0, "127.0.0.1", () => {
      resolve({
        socket,
        endpoint: {
          address: "127.0.0.1",
          port: socket.address().port,
          family: "IPv4",
        },
      });
    });
  });
}

export function sendTo(
  socket: DatagramSocket,
  frame: Uint8Array,
  endpoint: Endpoint
): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(frame, endpoint.port, endpoint.address, (err) =>
      err ? reject(err) : resolve()
    );
  });
}

export function nextDatagram(
  socket: DatagramSocket
): Promise<{ frame: Buffer; port: number }> {
  return new Promise((resolve) => {
    socket.once("message", (frame, info) => resolve({ frame, port: info.port }));
  });
}

export function closeUdp(socket: DatagramSocket): Promise<void> {
  return new Promise((resolve) => socket.close(() => resolve()));
}
