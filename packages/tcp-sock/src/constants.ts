// Sentinels and fixed socket policy shared by every operation.

/** Customary receive buffer size for callers that need one. */
export const BUFFER_SIZE = 1024;

/**
 * Non-data outcomes of the transfer primitives.
 *
 * All values are distinct from any positive byte count. `TIMEOUT` is 0 and
 * only ever returned by `recvMsgTimeout`, which never reports a 0-byte read.
 */
export const SocketStatus = {
  /** Generic failure (transport error, closed handle, bad arguments) */
  ERROR: -1,
  /** No data became readable within the timeout */
  TIMEOUT: 0,
  /** The peer performed an orderly shutdown */
  DISCONNECTED: -2,
} as const;

export type SocketStatus = (typeof SocketStatus)[keyof typeof SocketStatus];

/** Outcomes of a non-blocking, non-consuming peek. */
export const PeekResult = {
  /** At least one byte is queued */
  DATA: 1,
  /** Orderly close observed and nothing left to read */
  CLOSED: 0,
  ERROR: -1,
  /** Nothing queued yet; the connection is still open */
  WOULD_BLOCK: -3,
} as const;

export type PeekResult = (typeof PeekResult)[keyof typeof PeekResult];

/** Marks an unused slot in a tracked-connection table. */
export const EMPTY_SLOT = null;

export type PortAvailability = "available" | "unavailable";

/** TCP keep-alive settings applied to server sockets. */
export interface KeepAlivePolicy {
  readonly enabled: boolean;
  /** Idle time before the first probe. */
  readonly idleSeconds: number;
  /** Time between probes. */
  readonly intervalSeconds: number;
  /** Unanswered probes before the connection is declared dead. */
  readonly probeCount: number;
}

export const KEEPALIVE_POLICY: KeepAlivePolicy = Object.freeze({
  enabled: true,
  idleSeconds: 10,
  intervalSeconds: 5,
  probeCount: 3,
});

/** Largest valid TCP port number. */
export const MAX_PORT = 65535;

export function isValidPort(port: number, allowZero: boolean): boolean {
  return Number.isInteger(port) && port <= MAX_PORT && (allowZero ? port >= 0 : port > 0);
}
