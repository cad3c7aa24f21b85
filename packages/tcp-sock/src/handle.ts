// Connection handles.
//
// A ConnectionHandle owns one connected net.Socket. Incoming bytes are kept in
// a queue that stands in for the kernel receive buffer: they are only consumed
// by the receive primitives, and the socket is paused while the queue is at
// capacity so TCP flow control pushes back on the peer.

import net from "node:net";
import { PeekResult, type KeepAlivePolicy } from "./constants.ts";
import { currentSocketConfig } from "./config.ts";
import { readKeepAlive, type KeepAliveState } from "./keepalive.ts";

/** What a wait for readability ended with. */
export type Readiness = "ready" | "timeout" | "busy";

let nextHandleId = 1;

/** Allocate a process-unique handle id (used in diagnostics). */
export function allocateHandleId(): number {
  return nextHandleId++;
}

/**
 * An established TCP connection.
 *
 * Handles are created by `createClientSocket` and `acceptConnection` and are
 * owned by the caller until closed.
 */
export class ConnectionHandle {
  /** Process-unique id, stable for the handle's lifetime. */
  readonly id: number;
  /** Keep-alive policy inherited from the listening socket, if any. */
  readonly keepAlive: KeepAlivePolicy | null;

  private socket: net.Socket;
  private queue: Buffer[] = [];
  private queued = 0;
  private peerEnded = false;
  private error: Error | null = null;
  private closed = false;
  private waiter: (() => void) | null = null;

  private rxCapacity: number;
  private txCapacity: number;
  private pendingTx = 0;
  private flushWaiters: Array<() => void> = [];

  constructor(socket: net.Socket, keepAlive: KeepAlivePolicy | null = null) {
    const config = currentSocketConfig();
    this.id = allocateHandleId();
    this.keepAlive = keepAlive;
    this.socket = socket;
    this.rxCapacity = config.rxBufferSize;
    this.txCapacity = config.txBufferSize;

    socket.on("data", (chunk: Buffer) => {
      if (this.closed) return;
      this.queue.push(chunk);
      this.queued += chunk.length;
      if (this.queued >= this.rxCapacity) {
        socket.pause();
      }
      this.wake();
    });

    socket.on("end", () => {
      this.peerEnded = true;
      this.wake();
    });

    socket.on("error", (err: Error) => {
      this.error = err;
      this.wake();
    });

    socket.on("close", () => {
      this.wake();
      this.releaseFlushWaiters();
    });
  }

  /** Remote endpoint as "address:port", for diagnostics. */
  get remote(): string {
    return `${this.socket.remoteAddress ?? "?"}:${this.socket.remotePort ?? "?"}`;
  }

  /** Local port the connection is bound to. */
  get localPort(): number {
    return this.socket.localPort ?? 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Bytes received but not yet consumed. */
  get available(): number {
    return this.queued;
  }

  get receiveCapacity(): number {
    return this.rxCapacity;
  }

  get transmitCapacity(): number {
    return this.txCapacity;
  }

  /** Whether a receive would complete without waiting. */
  private hasOutcome(): boolean {
    return this.closed || this.queued > 0 || this.error !== null || this.peerEnded;
  }

  private wake(): void {
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter();
    }
  }

  /**
   * Wait until a receive would complete without waiting.
   *
   * Resolves "timeout" if `timeoutMs` elapses first (null waits forever), and
   * "busy" immediately if another receive is already waiting on this handle.
   */
  whenReadable(timeoutMs: number | null): Promise<Readiness> {
    if (this.hasOutcome()) {
      return Promise.resolve("ready");
    }
    if (this.waiter) {
      return Promise.resolve("busy");
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      if (timeoutMs !== null) {
        timer = setTimeout(() => {
          this.waiter = null;
          resolve("timeout");
        }, timeoutMs);
      }

      this.waiter = () => {
        if (timer) clearTimeout(timer);
        resolve("ready");
      };
    });
  }

  /**
   * Consume up to `max` queued bytes into the start of `target`.
   *
   * Returns the number of bytes copied (0 if nothing is queued).
   */
  take(target: Uint8Array, max: number): number {
    let copied = 0;
    while (copied < max && this.queue.length > 0) {
      const head = this.queue[0];
      const n = Math.min(head.length, max - copied);
      target.set(head.subarray(0, n), copied);
      copied += n;
      if (n === head.length) {
        this.queue.shift();
      } else {
        this.queue[0] = head.subarray(n);
      }
    }
    this.queued -= copied;

    if (this.socket.isPaused() && this.queued < this.rxCapacity && !this.closed) {
      this.socket.resume();
    }
    return copied;
  }

  /**
   * Report the receive state without consuming anything and without waiting.
   */
  peek(): PeekResult {
    if (this.closed) return PeekResult.ERROR;
    if (this.queued > 0) return PeekResult.DATA;
    if (this.error) return PeekResult.ERROR;
    if (this.peerEnded) return PeekResult.CLOSED;
    return PeekResult.WOULD_BLOCK;
  }

  /**
   * Keep-alive probe settings as the kernel reports them for this socket.
   * Null once the handle is closed.
   */
  keepAliveState(): KeepAliveState | null {
    if (this.closed || this.socket.destroyed) return null;
    return readKeepAlive(this.socket);
  }

  /** The transport error observed on this connection, if any. */
  get lastError(): Error | null {
    return this.error;
  }

  /**
   * Whether the handle can accept writes: open locally, no transport error,
   * and the socket still writable.
   */
  get writable(): boolean {
    return !this.closed && this.error === null && this.socket.writable;
  }

  /** Bytes that may be queued for transmission right now. */
  get transmitRoom(): number {
    return Math.max(0, this.txCapacity - this.pendingTx);
  }

  /**
   * Queue bytes for transmission. The bytes are copied, so the caller may
   * reuse its buffer as soon as this returns.
   */
  write(bytes: Uint8Array): void {
    const copy = Buffer.from(bytes);
    this.pendingTx += copy.length;
    this.socket.write(copy, () => {
      this.pendingTx -= copy.length;
      this.releaseFlushWaiters();
    });
  }

  /**
   * Wait until some queued transmit bytes have been flushed, or the
   * connection is gone.
   */
  whenFlushed(): Promise<void> {
    if (this.pendingTx === 0 || !this.writable) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.flushWaiters.push(resolve);
    });
  }

  private releaseFlushWaiters(): void {
    const waiters = this.flushWaiters;
    this.flushWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  /** Change the receive and transmit capacities. */
  setCapacities(rxBytes: number, txBytes: number): void {
    this.rxCapacity = rxBytes;
    this.txCapacity = txBytes;
    if (this.queued >= this.rxCapacity) {
      this.socket.pause();
    } else if (this.socket.isPaused() && !this.closed) {
      this.socket.resume();
    }
    this.releaseFlushWaiters();
  }

  /**
   * Close the connection. Pending writes are flushed before the socket is
   * destroyed; a receive waiting on this handle completes immediately.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.queued = 0;
    this.socket.destroySoon();
    this.wake();
    this.releaseFlushWaiters();
  }
}
