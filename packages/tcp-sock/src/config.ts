// Process-wide defaults for new connection handles.

import { SocketSetupError } from "./errors.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:config");

/** Configuration applied to every connection handle when it is created. */
export interface SocketConfig {
  /** Receive queue capacity in bytes. The socket is paused when it fills. */
  rxBufferSize: number;
  /** Maximum bytes that may be waiting in the transmit queue. */
  txBufferSize: number;
}

/** Default socket configuration. */
export function defaultSocketConfig(): SocketConfig {
  return {
    rxBufferSize: 128 * 1024,
    txBufferSize: 16 * 1024,
  };
}

let current: SocketConfig = defaultSocketConfig();

/** The configuration new handles are created with. */
export function currentSocketConfig(): SocketConfig {
  return { ...current };
}

/**
 * Replace the process-wide defaults. Fields left out fall back to
 * `defaultSocketConfig()`, so `configureSockets()` restores the defaults.
 *
 * Throws `SocketSetupError` (kind "buffer") for sizes that are not positive
 * integers.
 */
export function configureSockets(config: Partial<SocketConfig> = {}): SocketConfig {
  const next = { ...defaultSocketConfig(), ...config };
  assertBufferSize("rxBufferSize", next.rxBufferSize);
  assertBufferSize("txBufferSize", next.txBufferSize);
  current = next;
  return currentSocketConfig();
}

const ENV_KEYS = [
  ["rxBufferSize", "TCP_SOCK_RX_BUFFER"],
  ["txBufferSize", "TCP_SOCK_TX_BUFFER"],
] as const;

/**
 * Read configuration overrides from the environment.
 *
 * Values that are not positive integers are ignored with a warning.
 */
export function socketConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<SocketConfig> {
  const config: Partial<SocketConfig> = {};
  for (const [field, key] of ENV_KEYS) {
    const raw = env[key];
    if (raw === undefined || raw === "") continue;

    const value = Number(raw);
    if (!isBufferSize(value)) {
      log.warn(`ignoring ${key}=${raw}: expected a positive integer`);
      continue;
    }
    config[field] = value;
  }
  return config;
}

export function isBufferSize(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function assertBufferSize(name: string, value: number): void {
  if (!isBufferSize(value)) {
    throw SocketSetupError.buffer(`${name} must be a positive integer, got ${value}`);
  }
}
