// Send and receive primitives.
//
// None of these impose framing: bytes go out and come in exactly as the
// transport delivers them, and partial transfers are reported, not retried.

import { SocketStatus } from "./constants.ts";
import type { ConnectionHandle } from "./handle.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:io");

/** Longest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/** A wait duration split into whole seconds and the sub-second remainder. */
export interface WaitDuration {
  seconds: number;
  microseconds: number;
}

/**
 * Split a millisecond timeout into seconds and microseconds.
 *
 * Whole seconds go into `seconds`; `microseconds` is always below 1_000_000.
 *
 * @example
 * ```typescript
 * splitTimeout(1500); // { seconds: 1, microseconds: 500000 }
 * ```
 */
export function splitTimeout(timeoutMs: number): WaitDuration {
  let seconds = Math.floor(timeoutMs / 1000);
  let microseconds = Math.round((timeoutMs - seconds * 1000) * 1000);
  if (microseconds >= 1_000_000) {
    seconds += 1;
    microseconds -= 1_000_000;
  }
  return { seconds, microseconds };
}

/** Convert a wait duration back into a timer delay in milliseconds. */
export function timeoutDelayMs(wait: WaitDuration): number {
  return wait.seconds * 1000 + wait.microseconds / 1000;
}

/**
 * Validate a caller-supplied length against the buffer it refers to.
 * Returns the usable length, or null if `length` is not a non-negative integer.
 */
function usableLength(buffer: Uint8Array, length: number): number | null {
  if (!Number.isInteger(length) || length < 0) return null;
  return Math.min(length, buffer.length);
}

/**
 * Send up to `length` bytes from `buffer`.
 *
 * Resolves with the number of bytes handed to the transport, which is less
 * than requested when the transmit queue is nearly full. Waits only when the
 * queue has no room at all. Resolves `SocketStatus.ERROR` on failure.
 */
export async function sendMessage(
  handle: ConnectionHandle,
  buffer: Uint8Array,
  length: number,
): Promise<number> {
  const count = usableLength(buffer, length);
  if (count === null) {
    log.error(`send failed on connection ${handle.id}: invalid length ${length}`);
    return SocketStatus.ERROR;
  }

  while (handle.writable && handle.transmitRoom === 0) {
    await handle.whenFlushed();
  }
  if (!handle.writable) {
    log.error(`send failed on connection ${handle.id}: ${describeFailure(handle)}`);
    return SocketStatus.ERROR;
  }
  if (count === 0) return 0;

  const n = Math.min(count, handle.transmitRoom);
  handle.write(buffer.subarray(0, n));
  log.debug(`connection ${handle.id} sent ${n} of ${count} bytes`);
  return n;
}

/**
 * Receive into `buffer`, waiting as long as it takes for at least one byte.
 *
 * Resolves with the byte count, 0 once the peer has shut down and every queued
 * byte has been read, or `SocketStatus.ERROR` on failure (including the
 * handle being closed while waiting).
 */
export async function recvMsgBlocking(
  handle: ConnectionHandle,
  buffer: Uint8Array,
  length: number,
): Promise<number> {
  const capacity = usableLength(buffer, length);
  if (capacity === null) {
    log.error(`recv failed on connection ${handle.id}: invalid length ${length}`);
    return SocketStatus.ERROR;
  }
  if (capacity === 0 && !handle.isClosed) return 0;

  const readiness = await handle.whenReadable(null);
  if (readiness === "busy") {
    log.error(`recv failed on connection ${handle.id}: another receive is pending`);
    return SocketStatus.ERROR;
  }
  return consume(handle, buffer, capacity, 0);
}

/**
 * Receive into `buffer`, waiting at most `timeoutMs` milliseconds
 * (0..MAX_TIMEOUT_MS).
 *
 * Resolves with the byte count (always > 0), `SocketStatus.TIMEOUT` if nothing
 * arrived in time, `SocketStatus.DISCONNECTED` on orderly peer shutdown, or
 * `SocketStatus.ERROR` on failure.
 */
export async function recvMsgTimeout(
  handle: ConnectionHandle,
  buffer: Uint8Array,
  length: number,
  timeoutMs: number,
): Promise<number> {
  const capacity = usableLength(buffer, length);
  if (capacity === null || capacity < 1) {
    log.error(`recv failed on connection ${handle.id}: invalid length ${length}`);
    return SocketStatus.ERROR;
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
    log.error(`recv failed on connection ${handle.id}: invalid timeout ${timeoutMs}`);
    return SocketStatus.ERROR;
  }

  const readiness = await handle.whenReadable(timeoutDelayMs(splitTimeout(timeoutMs)));
  if (readiness === "busy") {
    log.error(`recv failed on connection ${handle.id}: another receive is pending`);
    return SocketStatus.ERROR;
  }
  if (readiness === "timeout") {
    log.debug(`timeout: no data received on connection ${handle.id} within ${timeoutMs}ms`);
    return SocketStatus.TIMEOUT;
  }
  return consume(handle, buffer, capacity, SocketStatus.DISCONNECTED);
}

/**
 * Complete a receive on a handle that is ready. `onEnd` is what an orderly
 * shutdown with nothing left to read reports.
 */
function consume(
  handle: ConnectionHandle,
  buffer: Uint8Array,
  capacity: number,
  onEnd: number,
): number {
  if (handle.isClosed || (handle.available === 0 && handle.lastError !== null)) {
    log.error(`recv failed on connection ${handle.id}: ${describeFailure(handle)}`);
    return SocketStatus.ERROR;
  }
  if (handle.available > 0) {
    const n = handle.take(buffer, capacity);
    log.debug(`connection ${handle.id} received ${n} bytes`);
    return n;
  }
  log.debug(`connection ${handle.id}: peer performed an orderly shutdown`);
  return onEnd;
}

function describeFailure(handle: ConnectionHandle): string {
  if (handle.isClosed) return "handle is closed";
  if (handle.lastError) return handle.lastError.message;
  return "socket is not writable";
}
