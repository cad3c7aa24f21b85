import net from "node:net";
import { isValidPort } from "./constants.ts";
import { ConnectionHandle } from "./handle.ts";
import { createLogger } from "./logging.ts";

const log = createLogger("tcp-sock:client");

/**
 * Connect to `address:port`, where `address` is a numeric IPv4 address.
 *
 * Resolves the connected handle, or null if the address does not parse or the
 * connection fails. Never rejects: an unreachable peer is a routine outcome
 * for a client.
 */
export function createClientSocket(address: string, port: number): Promise<ConnectionHandle | null> {
  if (!net.isIPv4(address)) {
    log.error(`invalid address/address not supported: ${address}`);
    return Promise.resolve(null);
  }
  if (!isValidPort(port, false)) {
    log.error(`invalid port: ${port}`);
    return Promise.resolve(null);
  }

  return new Promise((resolve) => {
    const socket = net.createConnection({ host: address, port, allowHalfOpen: true });

    const onError = (err: Error) => {
      log.error(`connection to ${address}:${port} failed: ${err.message}`);
      socket.destroy();
      resolve(null);
    };
    socket.once("error", onError);

    socket.once("connect", () => {
      socket.off("error", onError);
      const conn = new ConnectionHandle(socket);
      log.debug(`connection ${conn.id} established to ${address}:${port}`);
      resolve(conn);
    });
  });
}
