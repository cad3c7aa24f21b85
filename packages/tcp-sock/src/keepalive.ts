// TCP keep-alive on accepted sockets.
//
// Node's own setKeepAlive only reaches SO_KEEPALIVE and TCP_KEEPIDLE; the probe
// interval and count go through net-keepalive.

import type net from "node:net";
import * as NetKeepAlive from "net-keepalive";
import type { KeepAlivePolicy } from "./constants.ts";

/** Probe settings read back from a live socket. */
export interface KeepAliveState {
  intervalSeconds: number;
  probeCount: number;
}

/** Apply every setting of `policy` to `socket`. Throws if the OS refuses one. */
export function applyKeepAlive(socket: net.Socket, policy: KeepAlivePolicy): void {
  socket.setKeepAlive(policy.enabled, policy.idleSeconds * 1000);
  if (!policy.enabled) return;
  NetKeepAlive.setKeepAliveInterval(socket, policy.intervalSeconds * 1000);
  NetKeepAlive.setKeepAliveProbes(socket, policy.probeCount);
}

export function readKeepAlive(socket: net.Socket): KeepAliveState {
  return {
    intervalSeconds: NetKeepAlive.getKeepAliveInterval(socket) / 1000,
    probeCount: NetKeepAlive.getKeepAliveProbes(socket),
  };
}
