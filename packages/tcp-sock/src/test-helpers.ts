// Loopback fixtures shared by the socket tests.

import { acceptConnection, closeServer, createServerSocket, type ServerHandle } from "./server.ts";
import { createClientSocket } from "./client.ts";
import { closeHandle } from "./liveness.ts";
import type { ConnectionHandle } from "./handle.ts";

export const LOOPBACK = "127.0.0.1";

/** A listening server plus both ends of one connection to it. */
export interface ConnectedPair {
  server: ServerHandle;
  /** The end created by createClientSocket. */
  client: ConnectionHandle;
  /** The end accepted by the server. */
  peer: ConnectionHandle;
}

export async function connectedPair(): Promise<ConnectedPair> {
  const server = await createServerSocket(0, 5);
  const [client, peer] = await Promise.all([
    createClientSocket(LOOPBACK, server.port),
    acceptConnection(server),
  ]);
  if (!client || !peer) {
    closeServer(server);
    throw new Error("failed to set up a loopback connection");
  }
  return { server, client, peer };
}

export function closePair(pair: ConnectedPair): void {
  closeHandle(pair.client);
  closeHandle(pair.peer);
  closeServer(pair.server);
}

/** A port that was free a moment ago. */
export async function freePort(): Promise<number> {
  const server = await createServerSocket(0, 1);
  const port = server.port;
  closeServer(server);
  return port;
}

export function bytes(text: string): Buffer {
  return Buffer.from(text, "utf8");
}

export function text(buffer: Uint8Array, length: number): string {
  return Buffer.from(buffer.subarray(0, length)).toString("utf8");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
