// Connection teardown and disconnect detection.

import { PeekResult } from "./constants.ts";
import type { ConnectionHandle } from "./handle.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:liveness");

/** A caller-owned table of tracked connections; null marks an empty slot. */
export type ConnectionTable = Array<ConnectionHandle | null>;

/** Called for each connection the liveness scan finds closed by its peer. */
export type DisconnectHandler = (handle: ConnectionHandle) => void;

/** Close a connection without logging. Closing twice is a no-op. */
export function closeHandle(handle: ConnectionHandle): void {
  handle.close();
}

/**
 * Log that a client went away and close its handle.
 *
 * Callers must not hand the same handle in twice; `checkClientConnections`
 * guarantees that for the handles it tracks by emptying the slot.
 */
export function handleClientDisconnection(handle: ConnectionHandle): void {
  log.info(`client disconnected, closing socket ${handle.id}`);
  handle.close();
}

/**
 * Look at a connection's receive state without consuming or waiting.
 *
 * `PeekResult.CLOSED` (0) means the peer shut down and nothing is left to read.
 */
export function peekHandle(handle: ConnectionHandle): PeekResult {
  return handle.peek();
}

/**
 * Scan the first `maxClients` slots of `handles` once and prune connections
 * the peer has closed.
 *
 * A slot is pruned only when a peek reports an orderly close: the handler is
 * called with the handle and the slot is set to null. Slots with queued data,
 * nothing to read yet, or an error are left as they are. Never waits.
 */
export function checkClientConnections(
  handles: ConnectionTable,
  maxClients: number,
  onDisconnect: DisconnectHandler = handleClientDisconnection,
): void {
  const limit = Math.min(maxClients, handles.length);
  for (let i = 0; i < limit; i++) {
    const handle = handles[i];
    // Holes in a table built with new Array(n) read as undefined.
    if (!handle) continue;

    if (peekHandle(handle) === PeekResult.CLOSED) {
      log.info(`client socket ${handle.id} appears to have disconnected`);
      onDisconnect(handle);
      handles[i] = null;
    }
  }
}
