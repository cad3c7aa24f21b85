import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SocketStatus } from "./constants.ts";
import { setSocketBufferSize } from "./buffers.ts";
import { closeHandle } from "./liveness.ts";
import type { ConnectionHandle } from "./handle.ts";
import {
  MAX_TIMEOUT_MS,
  recvMsgBlocking,
  recvMsgTimeout,
  sendMessage,
  splitTimeout,
  timeoutDelayMs,
} from "./transfer.ts";
import { bytes, closePair, connectedPair, sleep, text, type ConnectedPair } from "./test-helpers.ts";

const MESSAGE = "Hello, server!";

/** Receive one message, wait `delayMs`, then send it back. */
async function echoWithDelay(conn: ConnectionHandle, delayMs: number): Promise<number> {
  const buffer = new Uint8Array(128);
  const received = await recvMsgBlocking(conn, buffer, buffer.length);
  if (received <= 0) return received;
  await sleep(delayMs);
  return sendMessage(conn, buffer, received);
}

describe("splitTimeout", () => {
  it("carries whole seconds into the seconds field", () => {
    expect(splitTimeout(100)).toEqual({ seconds: 0, microseconds: 100000 });
    expect(splitTimeout(1500)).toEqual({ seconds: 1, microseconds: 500000 });
    expect(splitTimeout(2000)).toEqual({ seconds: 2, microseconds: 0 });
    expect(splitTimeout(0)).toEqual({ seconds: 0, microseconds: 0 });
  });

  it("keeps sub-millisecond precision", () => {
    expect(splitTimeout(2.5)).toEqual({ seconds: 0, microseconds: 2500 });
  });

  it("converts back to the same number of milliseconds", () => {
    for (const ms of [1, 100, 250, 999, 1000, 1001, 12345]) {
      expect(timeoutDelayMs(splitTimeout(ms))).toBe(ms);
    }
  });

  it("waits milliseconds, not microseconds", () => {
    expect(timeoutDelayMs({ seconds: 0, microseconds: 100000 })).toBe(100);
    expect(timeoutDelayMs({ seconds: 1, microseconds: 500000 })).toBe(1500);
  });
});

describe("transfer primitives", () => {
  let pair: ConnectedPair;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    pair = await connectedPair();
  });

  afterEach(() => {
    closePair(pair);
    vi.restoreAllMocks();
  });

  it("delivers sent bytes unchanged", async () => {
    const sent = await sendMessage(pair.client, bytes(MESSAGE), MESSAGE.length);
    expect(sent).toBe(14);

    const buffer = new Uint8Array(128);
    const received = await recvMsgBlocking(pair.peer, buffer, buffer.length);
    expect(received).toBe(14);
    expect(text(buffer, received)).toBe(MESSAGE);
  });

  it("sends only the requested prefix", async () => {
    expect(await sendMessage(pair.client, bytes("abcdef"), 3)).toBe(3);

    const buffer = new Uint8Array(128);
    const received = await recvMsgBlocking(pair.peer, buffer, buffer.length);
    expect(text(buffer, received)).toBe("abc");
  });

  it("receives at most the requested length and keeps the rest queued", async () => {
    await sendMessage(pair.client, bytes("abcdefghij"), 10);

    const buffer = new Uint8Array(128);
    expect(await recvMsgBlocking(pair.peer, buffer, 3)).toBe(3);
    expect(text(buffer, 3)).toBe("abc");

    const rest = await recvMsgBlocking(pair.peer, buffer, buffer.length);
    expect(rest).toBe(7);
    expect(text(buffer, rest)).toBe("defghij");
  });

  it("clamps lengths to the buffer size", async () => {
    await sendMessage(pair.client, bytes("abcdefgh"), 8);

    const small = new Uint8Array(4);
    expect(await recvMsgBlocking(pair.peer, small, 1000)).toBe(4);
    expect(text(small, 4)).toBe("abcd");
  });

  it("reports a partial send when the transmit queue is nearly full", async () => {
    setSocketBufferSize(pair.client, 1024, 4);

    expect(await sendMessage(pair.client, bytes("abcdefghij"), 10)).toBe(4);

    const buffer = new Uint8Array(128);
    const received = await recvMsgBlocking(pair.peer, buffer, buffer.length);
    expect(text(buffer, received)).toBe("abcd");
  });

  it("sends zero bytes as a no-op", async () => {
    expect(await sendMessage(pair.client, bytes("x"), 0)).toBe(0);
  });

  it("rejects invalid lengths", async () => {
    const buffer = new Uint8Array(16);
    expect(await sendMessage(pair.client, buffer, -1)).toBe(SocketStatus.ERROR);
    expect(await recvMsgBlocking(pair.peer, buffer, 2.5)).toBe(SocketStatus.ERROR);
    expect(await recvMsgTimeout(pair.peer, buffer, 0, 100)).toBe(SocketStatus.ERROR);
  });

  it("fails on a closed handle", async () => {
    closeHandle(pair.client);

    const buffer = new Uint8Array(16);
    expect(await sendMessage(pair.client, bytes("x"), 1)).toBe(SocketStatus.ERROR);
    expect(await recvMsgBlocking(pair.client, buffer, buffer.length)).toBe(SocketStatus.ERROR);
    expect(await recvMsgTimeout(pair.client, buffer, buffer.length, 100)).toBe(SocketStatus.ERROR);
  });

  it("drops bytes that arrive after the handle is closed", async () => {
    closeHandle(pair.peer);
    await sendMessage(pair.client, bytes("late"), 4);
    await sleep(50);

    expect(pair.peer.available).toBe(0);
  });

  it("returns 0 from a blocking receive once the peer shuts down", async () => {
    await sendMessage(pair.client, bytes("xy"), 2);
    closeHandle(pair.client);

    const buffer = new Uint8Array(16);
    expect(await recvMsgBlocking(pair.peer, buffer, buffer.length)).toBe(2);
    expect(await recvMsgBlocking(pair.peer, buffer, buffer.length)).toBe(0);
  });

  it("fails a pending receive when its handle is closed", async () => {
    const buffer = new Uint8Array(16);
    const pending = recvMsgBlocking(pair.peer, buffer, buffer.length);

    closeHandle(pair.peer);
    expect(await pending).toBe(SocketStatus.ERROR);
  });

  it("fails a second concurrent receive on the same handle", async () => {
    const buffer = new Uint8Array(16);
    const first = recvMsgBlocking(pair.peer, buffer, buffer.length);

    expect(await recvMsgTimeout(pair.peer, new Uint8Array(16), 16, 1000)).toBe(SocketStatus.ERROR);

    await sendMessage(pair.client, bytes("ok"), 2);
    expect(await first).toBe(2);
    expect(text(buffer, 2)).toBe("ok");
  });

  describe("recvMsgTimeout", () => {
    it("times out when the peer answers too late", async () => {
      const echo = echoWithDelay(pair.peer, 500);
      expect(await sendMessage(pair.client, bytes(MESSAGE), MESSAGE.length)).toBe(14);

      const buffer = new Uint8Array(128);
      expect(await recvMsgTimeout(pair.client, buffer, buffer.length, 100)).toBe(SocketStatus.TIMEOUT);

      // The late answer is still delivered to the next receive.
      expect(await echo).toBe(14);
      const received = await recvMsgTimeout(pair.client, buffer, buffer.length, 2000);
      expect(received).toBe(14);
      expect(text(buffer, received)).toBe(MESSAGE);
    });

    it("receives an answer that arrives within the timeout", async () => {
      const echo = echoWithDelay(pair.peer, 100);
      expect(await sendMessage(pair.client, bytes(MESSAGE), MESSAGE.length)).toBe(14);

      const buffer = new Uint8Array(128);
      const received = await recvMsgTimeout(pair.client, buffer, buffer.length, 2000);
      expect(received).toBe(14);
      expect(text(buffer, received)).toBe(MESSAGE);
      expect(await echo).toBe(14);
    });

    it("waits for the whole timeout in milliseconds", async () => {
      const buffer = new Uint8Array(16);
      const started = Date.now();

      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, 200)).toBe(SocketStatus.TIMEOUT);
      expect(Date.now() - started).toBeGreaterThanOrEqual(150);
    });

    it("polls when the timeout is 0", async () => {
      const buffer = new Uint8Array(16);
      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, 0)).toBe(SocketStatus.TIMEOUT);
    });

    it("reports an orderly shutdown as DISCONNECTED", async () => {
      closeHandle(pair.client);

      const buffer = new Uint8Array(16);
      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, 2000)).toBe(SocketStatus.DISCONNECTED);
    });

    it("rejects invalid timeouts", async () => {
      const buffer = new Uint8Array(16);
      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, -1)).toBe(SocketStatus.ERROR);
      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, Number.NaN)).toBe(SocketStatus.ERROR);
    });

    it("rejects timeouts longer than a timer can wait", async () => {
      const buffer = new Uint8Array(16);
      expect(MAX_TIMEOUT_MS).toBe(2147483647);
      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, MAX_TIMEOUT_MS + 1)).toBe(SocketStatus.ERROR);
      expect(await recvMsgTimeout(pair.peer, buffer, buffer.length, 2 ** 40)).toBe(SocketStatus.ERROR);
    });
  });
});

describe("SocketStatus", () => {
  it("keeps the sentinels distinct from byte counts and each other", () => {
    expect(SocketStatus.ERROR).toBe(-1);
    expect(SocketStatus.TIMEOUT).toBe(0);
    expect(SocketStatus.DISCONNECTED).toBe(-2);
    expect(new Set(Object.values(SocketStatus)).size).toBe(3);
  });
});
